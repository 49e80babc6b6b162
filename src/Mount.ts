import type { FileSystemBackend, ResolutionContext } from './types';
import type VFS from './VFS';
import type VirtualFile from './VirtualFile';
import * as utils from './utils';

/**
 * A backend bound to a mount point. The mount doubles as the resolution
 * context that handle caches use to turn identifiers under the mount point
 * into VirtualFiles.
 */
class Mount<N = unknown> implements ResolutionContext {
  public readonly vfs: VFS;
  public readonly mountPoint: VirtualFile;
  public readonly backend: FileSystemBackend<N>;
  protected closed: boolean = false;

  public constructor(
    vfs: VFS,
    mountPoint: VirtualFile,
    backend: FileSystemBackend<N>,
  ) {
    this.vfs = vfs;
    this.mountPoint = mountPoint;
    this.backend = backend;
  }

  public get rootIdentifier(): string {
    return this.mountPoint.identifier;
  }

  /**
   * Resolves a percent-encoded path relative to the mount point into an
   * existing VirtualFile.
   */
  public resolve(relativePath: string): VirtualFile {
    return this.mountPoint.findChild(utils.decodePath(relativePath));
  }

  /**
   * Unmounts and closes the backend. Calling this again does nothing.
   */
  public close(): void {
    if (this.closed) return;
    this.closed = true;
    this.vfs.unmount(this);
    this.backend.close();
  }

  public toString(): string {
    return `Mount(${this.mountPoint})`;
  }
}

export default Mount;
