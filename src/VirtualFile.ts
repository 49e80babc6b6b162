import type { Readable } from 'stream';
import type { Signer, StructuredNode } from './types';
import type VFS from './VFS';
import type Mount from './Mount';
import * as constants from './constants';
import * as errors from './errors';
import * as traversal from './traversal';
import * as utils from './utils';

/**
 * A VirtualFile is one addressable entry of the unified tree. It is only a
 * name with a link to its parent, and it does not hold any data itself. Every
 * query is answered by the backend of the nearest mount at or above the file,
 * so the same VirtualFile can change its answers when backends are mounted or
 * unmounted underneath it.
 *
 * The parent link exists for traversal only. Nothing is owned through it, and
 * creating a child does not register it anywhere, so VirtualFiles can be built
 * for paths that do not exist yet.
 *
 * Two VirtualFiles are equal when they belong to the same VFS and have the
 * same path name.
 */
class VirtualFile implements StructuredNode<VirtualFile> {
  public readonly name: string;
  public readonly parent: VirtualFile | undefined;
  public readonly pathName: string;
  protected vfs: VFS;

  public constructor(vfs: VFS, name: string, parent?: VirtualFile) {
    this.vfs = vfs;
    this.name = name;
    this.parent = parent;
    if (parent == null) {
      this.pathName = constants.SEPARATOR;
    } else if (parent.parent == null) {
      this.pathName = constants.SEPARATOR + name;
    } else {
      this.pathName = parent.pathName + constants.SEPARATOR + name;
    }
  }

  /**
   * The canonical identifier of this file, as in `vfs://default/a/b.txt`.
   */
  public get identifier(): string {
    return utils.canonicalIdentifier(
      `${constants.SCHEME}://${this.vfs.name}${utils.encodePath(this.pathName)}`,
    );
  }

  public getVFS(): VFS {
    return this.vfs;
  }

  public getMount(): Mount | undefined {
    return this.vfs.getMount(this);
  }

  public equals(other: VirtualFile): boolean {
    return other.vfs === this.vfs && other.pathName === this.pathName;
  }

  /**
   * Gets the `/`-delimited path of this file relative to `other`. The result
   * is empty when both are equal.
   */
  public getPathNameRelativeTo(other: VirtualFile): string {
    if (
      other.vfs !== this.vfs ||
      !utils.isPathUnder(this.pathName, other.pathName)
    ) {
      throw new errors.ErrorVFSInvalidPath(
        `${this.pathName} is not beneath ${other.pathName}`,
      );
    }
    return utils.relativePath(this.pathName, other.pathName);
  }

  /**
   * Builds the VirtualFile for `path` below this one without touching any
   * backend. Dot segments are resolved on the way.
   */
  public getChild(path: string): VirtualFile {
    return traversal.walk<VirtualFile>(this, path, (node, name) =>
      node.createChild(name),
    );
  }

  /**
   * Gets the direct child only if it exists in the mounted backend.
   */
  public getDirectChild(name: string): VirtualFile | undefined {
    const child = this.createChild(name);
    return child.exists() ? child : undefined;
  }

  /**
   * Finds an existing descendant, failing with `ErrorVFSNotFound` at the
   * first segment that does not exist.
   */
  public findChild(path: string): VirtualFile {
    return traversal.findChild<VirtualFile>(this, path);
  }

  public getChildren(): Array<VirtualFile> {
    return this.listEntries().map((name) => this.createChild(name));
  }

  public exists(): boolean {
    const mount = this.getMount();
    return mount != null && mount.backend.exists(mount.mountPoint, this);
  }

  public isFile(): boolean {
    const mount = this.getMount();
    return mount != null && mount.backend.isFile(mount.mountPoint, this);
  }

  public isDirectory(): boolean {
    const mount = this.getMount();
    return mount != null && mount.backend.isDirectory(mount.mountPoint, this);
  }

  public isLeaf(): boolean {
    return !this.isDirectory();
  }

  public size(): number {
    const mount = this.getMount();
    return mount == null ? 0 : mount.backend.size(mount.mountPoint, this);
  }

  public lastModified(): number {
    const mount = this.getMount();
    return mount == null
      ? 0
      : mount.backend.lastModifiedTime(mount.mountPoint, this);
  }

  public listEntries(): Array<string> {
    const mount = this.getMount();
    return mount == null
      ? []
      : mount.backend.listEntries(mount.mountPoint, this);
  }

  public signers(): Array<Signer> | undefined {
    const mount = this.getMount();
    return mount?.backend.signers(mount.mountPoint, this);
  }

  public getNative(): unknown {
    const mount = this.getMount();
    return mount?.backend.resolveNative(mount.mountPoint, this);
  }

  public delete(): boolean {
    const mount = this.getMount();
    return mount != null && mount.backend.delete(mount.mountPoint, this);
  }

  public openReadStream(): Readable {
    const mount = this.getMount();
    if (mount == null) {
      throw new errors.ErrorVFSNotFound(`No backend is mounted for ${this}`);
    }
    return mount.backend.openReadStream(mount.mountPoint, this);
  }

  /**
   * Reads the whole content of this file.
   */
  public async readBytes(): Promise<Uint8Array> {
    return utils.readStream(this.openReadStream());
  }

  public toString(): string {
    return this.pathName;
  }

  protected createChild(name: string): VirtualFile {
    if (name.length === 0 || name.includes(constants.SEPARATOR)) {
      throw new errors.ErrorVFSInvalidPath(`Invalid segment name '${name}'`);
    }
    return new VirtualFile(this.vfs, name, this);
  }
}

export default VirtualFile;
