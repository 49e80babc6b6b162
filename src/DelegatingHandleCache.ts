import type { HandleCache, ResolutionContext } from './types';
import type VirtualFile from './VirtualFile';
import * as errors from './errors';

/**
 * Wraps another cache and forwards lookups to it. The wrapped cache owns its
 * contexts and its lifecycle, so registration is rejected and the lifecycle
 * methods do nothing.
 */
class DelegatingHandleCache implements HandleCache {
  protected delegate: HandleCache;

  public constructor(delegate: HandleCache) {
    this.delegate = delegate;
  }

  public get running(): boolean {
    return this.delegate.running;
  }

  public start(): void {}

  public stop(): void {}

  public lookup(identifier: string | URL): VirtualFile {
    return this.delegate.lookup(identifier);
  }

  public registerContext(context: ResolutionContext): void {
    throw new errors.ErrorHandleCacheRegistrationForbidden(
      `Context for ${context.rootIdentifier} should already be registered with the underlying cache`,
    );
  }

  public unregisterContext(_context: ResolutionContext): void {}
}

export default DelegatingHandleCache;
