import { Readable } from 'stream';
import vm from 'vm';
import { test } from '@fast-check/jest';
import * as vfsErrors from '@/errors';
import * as vfsUtils from '@/utils';
import config, { parseBoolean } from '@/config';
import * as utils from './utils';

describe('path utilities', () => {
  test('should split paths into non-empty segments', () => {
    expect(vfsUtils.splitPath('/a//b/')).toEqual(['a', 'b']);
    expect(vfsUtils.splitPath('./a/../b')).toEqual(['.', 'a', '..', 'b']);
    expect(vfsUtils.splitPath('')).toEqual([]);
  });

  test('should only treat whole segments as nested', () => {
    expect(vfsUtils.isPathUnder('/a/b', '/a/b')).toBeTrue();
    expect(vfsUtils.isPathUnder('/a/b/c', '/a/b')).toBeTrue();
    expect(vfsUtils.isPathUnder('/a/bc', '/a/b')).toBeFalse();
    expect(vfsUtils.isPathUnder('/a', '/')).toBeTrue();
    expect(vfsUtils.isPathUnder('C:\\a\\b', 'C:\\a', '\\')).toBeTrue();
  });

  test('should compute relative paths without leading separators', () => {
    expect(vfsUtils.relativePath('/a/b/c', '/a/b')).toBe('c');
    expect(vfsUtils.relativePath('/a/b', '/a/b')).toBe('');
    expect(vfsUtils.relativePath('/a/b', '/')).toBe('a/b');
  });

  test('should percent-encode each segment', () => {
    expect(vfsUtils.encodePath('/a b/c%')).toBe('/a%20b/c%25');
    expect(vfsUtils.decodePath('/a%20b/c%25')).toBe('/a b/c%');
  });

  test('should reject malformed encodings', () => {
    expect(() => vfsUtils.decodePath('/a%E0%A4%A')).toThrow(
      vfsErrors.ErrorVFSInvalidPath,
    );
  });

  test.prop([utils.uniqueSegmentsArb()])(
    'should round trip segment encoding',
    (segments) => {
      const pathName = '/' + segments.join('/');
      expect(vfsUtils.decodePath(vfsUtils.encodePath(pathName))).toBe(
        pathName,
      );
    },
  );
});

describe('canonical identifiers', () => {
  test('should strip trailing slashes, queries and fragments', () => {
    expect(vfsUtils.canonicalIdentifier('vfs://default/a/b/')).toBe(
      'vfs://default/a/b',
    );
    expect(vfsUtils.canonicalIdentifier('vfs://default/a?x=1#top')).toBe(
      'vfs://default/a',
    );
  });

  test('should keep the slash of the root', () => {
    expect(vfsUtils.canonicalIdentifier('vfs://default')).toBe(
      'vfs://default/',
    );
    expect(vfsUtils.canonicalIdentifier('vfs://default/')).toBe(
      'vfs://default/',
    );
  });

  test('should remove dot segments', () => {
    expect(vfsUtils.canonicalIdentifier('vfs://default/a/./b/../c')).toBe(
      'vfs://default/a/c',
    );
  });

  test('should accept URL objects', () => {
    expect(vfsUtils.canonicalIdentifier(new URL('vfs://default/a/'))).toBe(
      'vfs://default/a',
    );
  });

  test('should reject identifiers that are not URLs', () => {
    expect(() => vfsUtils.canonicalIdentifier('not a url')).toThrow(
      vfsErrors.ErrorVFSInvalidPath,
    );
  });

  test.prop([utils.uniqueSegmentsArb()])(
    'should be idempotent',
    (segments) => {
      const identifier = vfsUtils.canonicalIdentifier(
        'vfs://default' + vfsUtils.encodePath('/' + segments.join('/')),
      );
      expect(vfsUtils.canonicalIdentifier(identifier)).toBe(identifier);
    },
  );
});

describe('byte utilities', () => {
  test('should concatenate arrays in order', () => {
    const result = vfsUtils.concatUint8Arrays(
      new Uint8Array([1, 2]),
      new Uint8Array([]),
      new Uint8Array([3]),
    );
    expect([...result]).toEqual([1, 2, 3]);
  });

  test('should drain streams of buffers and strings', async () => {
    const stream = Readable.from(['hi', Buffer.from('!')]);
    const data = await vfsUtils.readStream(stream);
    expect(utils.decode(data)).toBe('hi!');
  });

  test('should fail on streams of other values', async () => {
    const stream = Readable.from([{ not: 'bytes' }]);
    await expect(vfsUtils.readStream(stream)).rejects.toThrow(
      vfsErrors.ErrorVFSUndefinedBehaviour,
    );
  });
});

describe('error utilities', () => {
  test('should recognise errno errors from any realm', () => {
    const foreign: unknown = vm.runInNewContext(
      "Object.assign(new Error('gone'), { code: 'ENOENT' })",
    );
    expect(foreign instanceof Error).toBeFalse();
    expect(vfsUtils.isErrnoException(foreign)).toBeTrue();
    expect(
      vfsUtils.isErrnoException(
        Object.assign(new Error('gone'), { code: 'ENOENT' }),
      ),
    ).toBeTrue();
  });

  test('should reject values without a code', () => {
    expect(vfsUtils.isErrnoException(new Error('plain'))).toBeFalse();
    expect(vfsUtils.isErrnoException(null)).toBeFalse();
    expect(vfsUtils.isErrnoException('ENOENT')).toBeFalse();
  });
});

describe('config', () => {
  test('should parse boolean environment values', () => {
    expect(parseBoolean('true')).toBeTrue();
    expect(parseBoolean(' 1 ')).toBeTrue();
    expect(parseBoolean('YES')).toBeTrue();
    expect(parseBoolean('false')).toBeFalse();
    expect(parseBoolean(undefined)).toBeFalse();
  });

  test('should have defaults', () => {
    expect(config.defaults.vfsName).toBe('default');
    expect(config.defaults.cacheMaxSize).toBe(1000);
  });
});
