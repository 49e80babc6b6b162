import { test } from '@fast-check/jest';
import VFS from '@/VFS';
import MemoryBackend from '@/MemoryBackend';
import MemoryNode from '@/MemoryNode';
import * as vfsErrors from '@/errors';
import * as utils from './utils';

describe('virtual file paths', () => {
  const vfs = new VFS();

  test('should name the root', () => {
    const root = vfs.getRootVirtualFile();
    expect(root.pathName).toBe('/');
    expect(root.name).toBe('');
    expect(root.parent).toBeUndefined();
    expect(root.identifier).toBe('vfs://default/');
    expect(root.getVFS()).toBe(vfs);
  });

  test('should build descendants without a backend', () => {
    const file = vfs.getChild('a/b/c.txt');
    expect(file.pathName).toBe('/a/b/c.txt');
    expect(file.name).toBe('c.txt');
    expect(file.parent?.pathName).toBe('/a/b');
    expect(`${file}`).toBe('/a/b/c.txt');
  });

  test('should resolve dot segments', () => {
    expect(vfs.getChild('/a/./b/../c/').pathName).toBe('/a/c');
    expect(vfs.getChild('a').getChild('..').pathName).toBe('/');
  });

  test('should not climb above the root', () => {
    expect(() => vfs.getChild('a/../..')).toThrow(vfsErrors.ErrorVFSNotFound);
  });

  test('should percent-encode identifiers', () => {
    expect(vfs.getChild('a b/c').identifier).toBe('vfs://default/a%20b/c');
    expect(vfs.getChild('100%').identifier).toBe('vfs://default/100%25');
  });

  test.prop([utils.uniqueSegmentsArb(4)])(
    'should compare by file system and path',
    (names) => {
      const path = names.join('/');
      expect(vfs.getChild(path).equals(vfs.getChild(path))).toBeTrue();
      expect(vfs.getChild(path).equals(new VFS().getChild(path))).toBeFalse();
    },
  );

  test('should compute paths relative to an ancestor', () => {
    const file = vfs.getChild('m/dir/b.txt');
    expect(file.getPathNameRelativeTo(vfs.getChild('m'))).toBe('dir/b.txt');
    expect(file.getPathNameRelativeTo(vfs.getRootVirtualFile())).toBe(
      'm/dir/b.txt',
    );
    expect(file.getPathNameRelativeTo(file)).toBe('');
  });

  test('should refuse paths relative to a non-ancestor', () => {
    const file = vfs.getChild('m/dir/b.txt');
    expect(() => file.getPathNameRelativeTo(vfs.getChild('m/di'))).toThrow(
      vfsErrors.ErrorVFSInvalidPath,
    );
    expect(() =>
      file.getPathNameRelativeTo(new VFS().getChild('m')),
    ).toThrow(vfsErrors.ErrorVFSInvalidPath);
  });
});

describe('virtual file queries', () => {
  let vfs: VFS;

  beforeEach(() => {
    vfs = new VFS();
  });

  test('should answer neutral values without a mount', async () => {
    const file = vfs.getChild('a.txt');
    expect(file.getMount()).toBeUndefined();
    expect(file.exists()).toBeFalse();
    expect(file.isFile()).toBeFalse();
    expect(file.isDirectory()).toBeFalse();
    expect(file.isLeaf()).toBeTrue();
    expect(file.size()).toBe(0);
    expect(file.lastModified()).toBe(0);
    expect(file.listEntries()).toEqual([]);
    expect(file.getChildren()).toEqual([]);
    expect(file.signers()).toBeUndefined();
    expect(file.getNative()).toBeUndefined();
    expect(file.delete()).toBeFalse();
    expect(vfs.getRootVirtualFile().getDirectChild('a.txt')).toBeUndefined();
    expect(() => file.openReadStream()).toThrow(vfsErrors.ErrorVFSNotFound);
    await expect(file.readBytes()).rejects.toThrow(vfsErrors.ErrorVFSNotFound);
  });

  test('should delegate queries to the mounted backend', async () => {
    const backend = new MemoryBackend();
    const node = backend.putFile('a.txt', 'hi');
    backend.mkdirs('dir');
    const mountPoint = vfs.mount('/m', backend).mountPoint;
    const file = mountPoint.getChild('a.txt');
    expect(file.exists()).toBeTrue();
    expect(file.isFile()).toBeTrue();
    expect(file.isLeaf()).toBeTrue();
    expect(file.size()).toBe(2);
    expect(file.lastModified()).toBe(node.lastModified);
    expect(file.getNative()).toBe(node);
    expect(utils.decode(await file.readBytes())).toBe('hi');
    expect(mountPoint.isDirectory()).toBeTrue();
    expect(mountPoint.isLeaf()).toBeFalse();
    expect(mountPoint.getChild('dir').isDirectory()).toBeTrue();
    expect(mountPoint.listEntries()).toEqual(['a.txt', 'dir']);
    expect(mountPoint.getChildren().map((child) => child.pathName)).toEqual([
      '/m/a.txt',
      '/m/dir',
    ]);
    expect(mountPoint.getNative()).toBe(backend.mountSource());
  });

  test('should find existing descendants only', () => {
    const backend = new MemoryBackend();
    backend.putFile('dir/b.txt', 'bee');
    const mountPoint = vfs.mount('/m', backend).mountPoint;
    expect(mountPoint.findChild('dir/b.txt').pathName).toBe('/m/dir/b.txt');
    expect(mountPoint.getDirectChild('dir')?.pathName).toBe('/m/dir');
    expect(mountPoint.getDirectChild('nope')).toBeUndefined();
    expect(() => mountPoint.findChild('dir/nope.txt')).toThrow(
      '/m/dir has no child: nope.txt',
    );
  });

  test('should delete through the backend', () => {
    const root = new MemoryNode(undefined, '');
    new MemoryNode(root, 'gone').setContents(utils.encode('x'));
    const mountPoint = vfs.mount('/m', new MemoryBackend({ root }))
      .mountPoint;
    const file = mountPoint.getChild('gone');
    expect(file.delete()).toBeTrue();
    expect(file.exists()).toBeFalse();
    expect(root.getChildren()).toEqual([]);
  });

  test('should follow the nearest mount', () => {
    const outer = new MemoryBackend();
    outer.putFile('dir/b.txt', 'outer');
    const inner = new MemoryBackend();
    inner.putFile('c.txt', 'inner');
    vfs.mount('/m', outer);
    const file = vfs.getChild('m/dir/b.txt');
    expect(file.exists()).toBeTrue();
    const innerMount = vfs.mount('/m/dir', inner);
    expect(file.getMount()).toBe(innerMount);
    expect(file.exists()).toBeFalse();
    expect(vfs.getChild('m/dir/c.txt').exists()).toBeTrue();
    vfs.unmount(innerMount);
    expect(file.exists()).toBeTrue();
  });
});
