import type { Readable } from 'stream';
import type { FileSystemBackend, Signer } from './types';
import type VirtualFile from './VirtualFile';
import { getLogger } from '@logtape/logtape';
import MemoryNode from './MemoryNode';
import * as constants from './constants';
import * as errors from './errors';
import * as traversal from './traversal';
import * as utils from './utils';

const logger = getLogger(['vfs', 'memory']);

/**
 * A backend whose files live in a tree of {@link MemoryNode} held in process
 * memory. Nothing is persisted.
 *
 * Targets are resolved by walking their path relative to the mount from the
 * root node with the shared structured traversal.
 */
class MemoryBackend implements FileSystemBackend<MemoryNode> {
  protected root: MemoryNode;

  public constructor({ root }: { root?: MemoryNode } = {}) {
    this.root = root ?? new MemoryNode(undefined, '');
    logger.debug('Constructed memory backend');
  }

  public openReadStream(mount: VirtualFile, target: VirtualFile): Readable {
    const node = this.resolveNative(mount, target);
    if (node == null) {
      throw new errors.ErrorVFSNotFound(target.pathName);
    }
    return node.openStream();
  }

  public isReadOnly(): boolean {
    return false;
  }

  public resolveNative(
    mount: VirtualFile,
    target: VirtualFile,
  ): MemoryNode | undefined {
    if (target.equals(mount)) return this.root;
    try {
      return this.root.findChild(target.getPathNameRelativeTo(mount));
    } catch (e) {
      if (e instanceof errors.ErrorVFSNotFound) return;
      throw e;
    }
  }

  public delete(mount: VirtualFile, target: VirtualFile): boolean {
    return this.resolveNative(mount, target)?.delete() ?? false;
  }

  public size(mount: VirtualFile, target: VirtualFile): number {
    return this.resolveNative(mount, target)?.size ?? 0;
  }

  public lastModifiedTime(mount: VirtualFile, target: VirtualFile): number {
    return this.resolveNative(mount, target)?.lastModified ?? 0;
  }

  public exists(mount: VirtualFile, target: VirtualFile): boolean {
    return this.resolveNative(mount, target) != null;
  }

  public isFile(mount: VirtualFile, target: VirtualFile): boolean {
    return this.resolveNative(mount, target)?.isLeaf() ?? false;
  }

  public isDirectory(mount: VirtualFile, target: VirtualFile): boolean {
    const node = this.resolveNative(mount, target);
    return node != null && !node.isLeaf();
  }

  public listEntries(mount: VirtualFile, target: VirtualFile): Array<string> {
    const node = this.resolveNative(mount, target);
    if (node == null || node.isLeaf()) return [];
    return node.getChildren().map((child) => child.name);
  }

  public signers(
    _mount: VirtualFile,
    _target: VirtualFile,
  ): Array<Signer> | undefined {
    return;
  }

  public mountSource(): MemoryNode {
    return this.root;
  }

  /**
   * Gets the directory node at `path`, creating every missing node on the way.
   */
  public mkdirs(path: string): MemoryNode {
    const directory = traversal.walk(this.root, path, (node, name) => {
      if (node.isLeaf()) {
        throw new errors.ErrorVFSInvariantViolation(
          `Cannot create ${name} under leaf node ${node}`,
        );
      }
      return node.getDirectChild(name) ?? new MemoryNode(node, name);
    });
    if (directory.isLeaf()) {
      throw new errors.ErrorVFSInvariantViolation(`${directory} is a leaf node`);
    }
    return directory;
  }

  /**
   * Creates or replaces the leaf at `path`, creating missing parents.
   */
  public putFile(path: string, contents: Uint8Array | string): MemoryNode {
    const segments = utils.splitPath(path);
    const name = segments.pop();
    if (name == null) {
      throw new errors.ErrorVFSInvalidPath('Cannot put contents at the root');
    }
    if (
      name === constants.CURRENT_SEGMENT ||
      name === constants.PARENT_SEGMENT
    ) {
      throw new errors.ErrorVFSInvalidPath(`Invalid file name ${name}`);
    }
    const parent = this.mkdirs(segments.join(constants.SEPARATOR));
    const node = parent.getDirectChild(name) ?? new MemoryNode(parent, name);
    node.setContents(
      typeof contents === 'string'
        ? new TextEncoder().encode(contents)
        : contents,
    );
    return node;
  }

  /**
   * The tree lives as long as it is referenced, so there is nothing to
   * release.
   */
  public close(): void {
    logger.debug('Closed memory backend');
  }
}

export default MemoryBackend;
