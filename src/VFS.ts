import type { FileSystemBackend, HandleCache } from './types';
import { getLogger } from '@logtape/logtape';
import VirtualFile from './VirtualFile';
import Mount from './Mount';
import HandleCacheRegistry from './HandleCacheRegistry';
import config from './config';
import * as errors from './errors';
import * as utils from './utils';

const logger = getLogger(['vfs', 'core']);

type VFSOptions = {
  name?: string;
  cacheRegistry?: HandleCacheRegistry;
};

/**
 * The VFS owns the root of a unified tree, the table of mounted backends and
 * the registry holding the handle cache used for identifier lookups.
 *
 * Mounting a backend at a VirtualFile makes the backend answer every query for
 * that file and its descendants, unless a deeper mount takes over. When the
 * current handle cache is running, each mount is registered with it as a
 * resolution context, and it is unregistered from that same cache on unmount
 * even if another cache has become current since.
 *
 * The `name` becomes the authority of every identifier produced by this VFS,
 * so two VFS instances sharing a cache must have different names.
 */
class VFS {
  public readonly name: string;
  public readonly cacheRegistry: HandleCacheRegistry;
  protected root: VirtualFile;
  protected mounts: Map<string, Mount> = new Map();
  /**
   * The cache each mount was registered with, which may no longer be current.
   */
  protected registrations: Map<Mount, HandleCache> = new Map();

  public constructor({
    name = config.defaults.vfsName,
    cacheRegistry = new HandleCacheRegistry(),
  }: VFSOptions = {}) {
    this.name = name;
    this.cacheRegistry = cacheRegistry;
    this.root = new VirtualFile(this, '');
    logger.debug('Created VFS {name}', { name });
  }

  public getRootVirtualFile(): VirtualFile {
    return this.root;
  }

  public getChild(path: string): VirtualFile {
    return this.root.getChild(path);
  }

  /**
   * Mounts `backend` at `mountPoint`. Fails with `ErrorVFSMountExists` if the
   * mount point is taken, or with the cache's error if the current cache
   * refuses the registration, in which case nothing is mounted.
   */
  public mount<N>(
    mountPoint: VirtualFile | string,
    backend: FileSystemBackend<N>,
  ): Mount<N> {
    const point =
      typeof mountPoint === 'string' ? this.getChild(mountPoint) : mountPoint;
    if (point.getVFS() !== this) {
      throw new errors.ErrorVFSInvalidPath(
        `Mount point ${point} belongs to another VFS`,
      );
    }
    if (this.mounts.has(point.pathName)) {
      throw new errors.ErrorVFSMountExists(
        `A backend is already mounted at ${point}`,
      );
    }
    const mount = new Mount(this, point, backend);
    const cache = this.cacheRegistry.getCurrent();
    if (cache?.running) {
      cache.registerContext(mount);
      this.registrations.set(mount, cache);
    }
    this.mounts.set(point.pathName, mount);
    logger.info('Mounted {backend} at {mountPoint}', {
      backend: backend.constructor.name,
      mountPoint: point.pathName,
    });
    return mount;
  }

  /**
   * Removes `mount` from the mount table. This does not close the backend,
   * see {@link Mount.close} for that.
   */
  public unmount(mount: Mount): void {
    if (this.mounts.get(mount.mountPoint.pathName) !== mount) return;
    this.mounts.delete(mount.mountPoint.pathName);
    const cache = this.registrations.get(mount);
    if (cache != null) {
      this.registrations.delete(mount);
      cache.unregisterContext(mount);
    }
    logger.info('Unmounted {mountPoint}', {
      mountPoint: mount.mountPoint.pathName,
    });
  }

  /**
   * Gets the nearest mount at or above `file`.
   */
  public getMount(file: VirtualFile): Mount | undefined {
    if (file.getVFS() !== this) return;
    let current: VirtualFile | undefined = file;
    while (current != null) {
      const mount = this.mounts.get(current.pathName);
      if (mount != null) return mount;
      current = current.parent;
    }
    return;
  }

  public getMounts(): Array<Mount> {
    return [...this.mounts.values()];
  }

  /**
   * Gets an existing file by its identifier. The current handle cache answers
   * if it is running and has a context covering the identifier, otherwise the
   * identifier is resolved by walking down from the root.
   */
  public getFile(identifier: string | URL): VirtualFile {
    const cache = this.cacheRegistry.getCurrent();
    if (cache?.running) {
      try {
        return cache.lookup(identifier);
      } catch (e) {
        if (!(e instanceof errors.ErrorVFSNoContext)) throw e;
        logger.debug('No cached context for {identifier}', {
          identifier: `${identifier}`,
        });
      }
    }
    const canonical = utils.canonicalIdentifier(identifier);
    const rootIdentifier = this.root.identifier;
    if (!utils.isPathUnder(canonical, rootIdentifier)) {
      throw new errors.ErrorVFSNotFound(
        `Identifier ${canonical} does not belong to VFS ${this.name}`,
      );
    }
    return this.root.findChild(
      utils.decodePath(utils.relativePath(canonical, rootIdentifier)),
    );
  }

  /**
   * Closes every mount and its backend.
   */
  public close(): void {
    for (const mount of this.getMounts()) {
      mount.close();
    }
  }
}

export default VFS;

export type { VFSOptions };
