import type VirtualFile from './VirtualFile';
import MapHandleCache from './MapHandleCache';
import config from './config';
import * as errors from './errors';

/**
 * A handle cache bounded to `maxSize` entries. Hits refresh an entry, and the
 * least recently used entry is evicted once the bound is exceeded. Map
 * iteration order is insertion order, which doubles as the recency order.
 */
class LRUHandleCache extends MapHandleCache {
  public readonly maxSize: number;

  public constructor({
    maxSize = config.defaults.cacheMaxSize,
  }: { maxSize?: number } = {}) {
    super();
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new errors.ErrorHandleCache(
        `The maximum size must be a positive integer but got ${maxSize}`,
      );
    }
    this.maxSize = maxSize;
  }

  protected getEntry(key: string): VirtualFile | undefined {
    const file = this.entries.get(key);
    if (file != null) {
      this.entries.delete(key);
      this.entries.set(key, file);
    }
    return file;
  }

  protected putEntry(key: string, file: VirtualFile): void {
    this.entries.delete(key);
    this.entries.set(key, file);
    for (const oldest of this.entries.keys()) {
      if (this.entries.size <= this.maxSize) break;
      this.entries.delete(oldest);
    }
  }
}

export default LRUHandleCache;
