import type { HandleCache } from './types';
import { getLogger } from '@logtape/logtape';

const logger = getLogger(['vfs', 'cache']);

/**
 * Holds the handle cache currently used by a VFS. Swapping the cache only
 * affects lookups made afterwards; VirtualFiles already handed out stay
 * valid. Starting and stopping caches is left to whoever creates them.
 */
class HandleCacheRegistry {
  protected current: HandleCache | undefined;

  public constructor(cache?: HandleCache) {
    this.current = cache;
  }

  public getCurrent(): HandleCache | undefined {
    return this.current;
  }

  public setCurrent(cache: HandleCache | undefined): void {
    this.current = cache;
    logger.debug('Current handle cache set to {cache}', {
      cache: cache?.constructor.name ?? 'none',
    });
  }
}

export default HandleCacheRegistry;
