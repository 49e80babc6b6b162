import type { Readable } from 'stream';
import type VirtualFile from './VirtualFile';

/**
 * Identity of a party that signed a resource. Backends without signing
 * support never produce these.
 */
type Signer = {
  subject: string;
  fingerprint: string;
};

/**
 * The capability set every storage backend implements. Each operation takes
 * the mount root and a target which must lie within the mount's subtree.
 *
 * Queries never throw for a missing resource. Absence is encoded in the
 * return value as `false`, `0`, `[]` or `undefined`. Only
 * {@link FileSystemBackend.openReadStream} fails with `ErrorVFSNotFound`.
 *
 * @typeParam N the backend's native representation of a resource
 */
interface FileSystemBackend<N = unknown> {
  openReadStream(mount: VirtualFile, target: VirtualFile): Readable;
  isReadOnly(): boolean;
  /**
   * Translates a virtual target into the native representation. `undefined`
   * means there is no such resource, never an error.
   */
  resolveNative(mount: VirtualFile, target: VirtualFile): N | undefined;
  delete(mount: VirtualFile, target: VirtualFile): boolean;
  size(mount: VirtualFile, target: VirtualFile): number;
  /**
   * Milliseconds since the epoch, 0 when absent.
   */
  lastModifiedTime(mount: VirtualFile, target: VirtualFile): number;
  exists(mount: VirtualFile, target: VirtualFile): boolean;
  isFile(mount: VirtualFile, target: VirtualFile): boolean;
  isDirectory(mount: VirtualFile, target: VirtualFile): boolean;
  listEntries(mount: VirtualFile, target: VirtualFile): Array<string>;
  signers(mount: VirtualFile, target: VirtualFile): Array<Signer> | undefined;
  mountSource(): N;
  close(): void;
}

/**
 * Anything the shared traversal can walk through by name.
 */
interface StructuredNode<T extends StructuredNode<T>> {
  readonly parent: T | undefined;
  getDirectChild(name: string): T | undefined;
}

/**
 * A backend context registered with a handle cache. The cache resolves
 * identifiers under `rootIdentifier` through it on a miss.
 */
interface ResolutionContext {
  readonly rootIdentifier: string;
  resolve(relativePath: string): VirtualFile;
}

interface HandleCache {
  readonly running: boolean;
  start(): void;
  stop(): void;
  lookup(identifier: string | URL): VirtualFile;
  registerContext(context: ResolutionContext): void;
  unregisterContext(context: ResolutionContext): void;
}

enum HandleCacheState {
  STOPPED,
  STARTED,
}

export type {
  Signer,
  FileSystemBackend,
  StructuredNode,
  ResolutionContext,
  HandleCache,
};

export { HandleCacheState };
