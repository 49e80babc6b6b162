import type { HandleCache, ResolutionContext } from './types';
import type VirtualFile from './VirtualFile';
import { getLogger } from '@logtape/logtape';
import { HandleCacheState } from './types';
import * as errors from './errors';
import * as utils from './utils';

const logger = getLogger(['vfs', 'cache']);

/**
 * A handle cache keeping every resolved VirtualFile in a map keyed by its
 * canonical identifier. Entries are never evicted while the cache runs, see
 * {@link LRUHandleCache} for a bounded variant.
 *
 * The cache must be started before contexts can be registered or identifiers
 * looked up. Stopping it drops all entries and all registered contexts, so a
 * restarted cache begins empty.
 *
 * On a miss, the identifier is resolved through the registered context with
 * the longest root identifier that contains it, or fails with
 * `ErrorVFSNoContext` when there is none. Errors thrown by the context are
 * propagated as they are and nothing is stored.
 */
class MapHandleCache implements HandleCache {
  protected state: HandleCacheState = HandleCacheState.STOPPED;
  protected entries: Map<string, VirtualFile> = new Map();
  protected contexts: Set<ResolutionContext> = new Set();

  public get running(): boolean {
    return this.state === HandleCacheState.STARTED;
  }

  public start(): void {
    if (this.state === HandleCacheState.STARTED) return;
    this.state = HandleCacheState.STARTED;
    logger.debug('Started {cache}', { cache: this.constructor.name });
  }

  public stop(): void {
    if (this.state === HandleCacheState.STOPPED) return;
    this.entries.clear();
    this.contexts.clear();
    this.state = HandleCacheState.STOPPED;
    logger.debug('Stopped {cache}', { cache: this.constructor.name });
  }

  public registerContext(context: ResolutionContext): void {
    this.assertRunning();
    if (this.contexts.has(context)) {
      throw new errors.ErrorHandleCacheDuplicateContext(
        `Context for ${context.rootIdentifier} is already registered`,
      );
    }
    this.contexts.add(context);
    logger.debug('Registered context {root}', {
      root: context.rootIdentifier,
    });
  }

  public unregisterContext(context: ResolutionContext): void {
    if (!this.contexts.delete(context)) return;
    const root = utils.canonicalIdentifier(context.rootIdentifier);
    for (const key of [...this.entries.keys()]) {
      if (utils.isPathUnder(key, root)) this.entries.delete(key);
    }
    logger.debug('Unregistered context {root}', { root });
  }

  public lookup(identifier: string | URL): VirtualFile {
    this.assertRunning();
    const key = utils.canonicalIdentifier(identifier);
    const cached = this.getEntry(key);
    if (cached != null) return cached;
    const found = this.findContext(key);
    if (found == null) {
      throw new errors.ErrorVFSNoContext(`No context can resolve ${key}`);
    }
    const [context, root] = found;
    const file = context.resolve(utils.relativePath(key, root));
    this.putEntry(key, file);
    return file;
  }

  /**
   * Number of cached entries.
   */
  public get size(): number {
    return this.entries.size;
  }

  protected getEntry(key: string): VirtualFile | undefined {
    return this.entries.get(key);
  }

  protected putEntry(key: string, file: VirtualFile): void {
    this.entries.set(key, file);
  }

  /**
   * Finds the context with the longest root containing `key`, along with
   * that root in canonical form.
   */
  protected findContext(key: string): [ResolutionContext, string] | undefined {
    let found: [ResolutionContext, string] | undefined;
    for (const context of this.contexts) {
      const root = utils.canonicalIdentifier(context.rootIdentifier);
      if (!utils.isPathUnder(key, root)) continue;
      if (found == null || root.length > found[1].length) {
        found = [context, root];
      }
    }
    return found;
  }

  protected assertRunning(): void {
    if (this.state !== HandleCacheState.STARTED) {
      throw new errors.ErrorHandleCacheNotRunning(
        `Expected state ${HandleCacheState[HandleCacheState.STARTED]} but got ${
          HandleCacheState[this.state]
        }`,
      );
    }
  }
}

export default MapHandleCache;
