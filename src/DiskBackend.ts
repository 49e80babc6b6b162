import type { Readable } from 'stream';
import type { FileSystemBackend, Signer } from './types';
import type VirtualFile from './VirtualFile';
import fs from 'fs';
import path from 'path';
import { getLogger } from '@logtape/logtape';
import config from './config';
import * as constants from './constants';
import * as errors from './errors';
import * as utils from './utils';

const logger = getLogger(['vfs', 'disk']);

type DiskBackendOptions = {
  root: string;
  caseSensitive?: boolean;
};

/**
 * A backend mapping virtual paths onto a real directory tree. The native
 * representation of a resource is its path on the host.
 *
 * Many host file systems are case-insensitive, which would let a virtual path
 * with the wrong letter case resolve to a real file. With `caseSensitive`
 * enabled, every resolved path is canonicalised and compared segment by
 * segment against the names of the virtual target and its ancestors. Any
 * mismatch, and any failure to canonicalise, makes the resource absent.
 * Because canonicalisation resolves symlinks, a target reached through a
 * symlink whose name differs from its destination is also absent.
 *
 * Metadata queries swallow I/O errors into their neutral value. Opening a
 * stream reports them.
 */
class DiskBackend implements FileSystemBackend<string> {
  public readonly root: string;
  public readonly caseSensitive: boolean;

  public constructor({
    root,
    caseSensitive = config.defaults.caseSensitive,
  }: DiskBackendOptions) {
    this.root = path.resolve(root);
    this.caseSensitive = caseSensitive;
    logger.debug('Constructed disk backend at root {root}', {
      root: this.root,
      caseSensitive,
    });
  }

  /**
   * Opens the file for reading. The descriptor is opened before returning, so
   * a missing file fails here and not on the first read.
   */
  public openReadStream(mount: VirtualFile, target: VirtualFile): Readable {
    const file = this.resolveNative(mount, target);
    if (file == null) {
      throw new errors.ErrorVFSNotFound(target.pathName);
    }
    let fd: number;
    try {
      fd = fs.openSync(file, 'r');
    } catch (e) {
      if (utils.isErrnoException(e) && e.code === 'ENOENT') {
        throw new errors.ErrorVFSNotFound(target.pathName, { cause: e });
      }
      throw new errors.ErrorVFSIO(`Failed to open ${target.pathName}`, {
        cause: e,
      });
    }
    let isDirectory: boolean;
    try {
      isDirectory = fs.fstatSync(fd).isDirectory();
    } catch (e) {
      fs.closeSync(fd);
      throw new errors.ErrorVFSIO(`Failed to stat ${target.pathName}`, {
        cause: e,
      });
    }
    if (isDirectory) {
      fs.closeSync(fd);
      throw new errors.ErrorVFSNotFound(`${target.pathName} is a directory`);
    }
    return fs.createReadStream(file, { fd });
  }

  public isReadOnly(): boolean {
    return false;
  }

  public resolveNative(
    mount: VirtualFile,
    target: VirtualFile,
  ): string | undefined {
    if (target.equals(mount)) {
      return this.root;
    }
    const relativePath = target.getPathNameRelativeTo(mount);
    const file = path.join(
      this.root,
      constants.NEEDS_CONVERSION
        ? relativePath.split(constants.SEPARATOR).join(path.sep)
        : relativePath,
    );
    if (!this.caseSensitive) {
      return file;
    }
    return this.verifyCase(mount, target, file);
  }

  public delete(mount: VirtualFile, target: VirtualFile): boolean {
    const file = this.resolveNative(mount, target);
    if (file == null) return false;
    try {
      if (fs.statSync(file).isDirectory()) {
        fs.rmdirSync(file);
      } else {
        fs.unlinkSync(file);
      }
      return true;
    } catch (e) {
      logger.debug('Failed to delete {file}: {error}', { file, error: e });
      return false;
    }
  }

  public size(mount: VirtualFile, target: VirtualFile): number {
    const stat = this.stat(mount, target);
    return stat != null && stat.isFile() ? stat.size : 0;
  }

  public lastModifiedTime(mount: VirtualFile, target: VirtualFile): number {
    const stat = this.stat(mount, target);
    return stat == null ? 0 : Math.floor(stat.mtimeMs);
  }

  public exists(mount: VirtualFile, target: VirtualFile): boolean {
    return this.stat(mount, target) != null;
  }

  public isFile(mount: VirtualFile, target: VirtualFile): boolean {
    return this.stat(mount, target)?.isFile() ?? false;
  }

  public isDirectory(mount: VirtualFile, target: VirtualFile): boolean {
    return this.stat(mount, target)?.isDirectory() ?? false;
  }

  public listEntries(mount: VirtualFile, target: VirtualFile): Array<string> {
    const file = this.resolveNative(mount, target);
    if (file == null) return [];
    try {
      return fs.readdirSync(file);
    } catch (e) {
      logger.debug('Failed to list {file}: {error}', { file, error: e });
      return [];
    }
  }

  public signers(
    _mount: VirtualFile,
    _target: VirtualFile,
  ): Array<Signer> | undefined {
    return;
  }

  public mountSource(): string {
    return this.root;
  }

  public close(): void {
    logger.debug('Closed disk backend at root {root}', { root: this.root });
  }

  protected stat(
    mount: VirtualFile,
    target: VirtualFile,
  ): fs.Stats | undefined {
    const file = this.resolveNative(mount, target);
    if (file == null) return;
    try {
      return fs.statSync(file, { throwIfNoEntry: false });
    } catch (e) {
      logger.debug('Failed to stat {file}: {error}', { file, error: e });
      return;
    }
  }

  /**
   * Walks the canonical path of `file` and the name chain of `target` from
   * the leaf upwards. Each canonical segment must equal the name of the
   * matching virtual node, and both walks must reach the root together.
   */
  protected verifyCase(
    mount: VirtualFile,
    target: VirtualFile,
    file: string,
  ): string | undefined {
    let canonicalRoot: string;
    let canonicalFile: string;
    try {
      canonicalRoot = fs.realpathSync.native(this.root);
      canonicalFile = fs.realpathSync.native(file);
    } catch (e) {
      logger.debug('Cannot verify case of {file}: {error}', {
        file,
        error: e,
      });
      return;
    }
    if (!utils.isPathUnder(canonicalFile, canonicalRoot, path.sep)) {
      return;
    }
    let targetCurrent: VirtualFile | undefined = target;
    let fileCurrent = canonicalFile;
    while (targetCurrent != null) {
      if (fileCurrent === canonicalRoot || fileCurrent === '') {
        return targetCurrent.equals(mount) ? file : undefined;
      } else if (targetCurrent.equals(mount)) {
        return;
      }
      const index = fileCurrent.lastIndexOf(path.sep);
      const segment =
        index === -1 ? fileCurrent : fileCurrent.substring(index + 1);
      if (segment !== targetCurrent.name) {
        logger.debug('Canonical segment {segment} does not match {name}', {
          segment,
          name: targetCurrent.name,
        });
        return;
      }
      targetCurrent = targetCurrent.parent;
      fileCurrent = index === -1 ? '' : fileCurrent.substring(0, index);
    }
    return;
  }
}

export default DiskBackend;

export type { DiskBackendOptions };
