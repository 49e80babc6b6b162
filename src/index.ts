export { default as VFS } from './VFS';
export { default as VirtualFile } from './VirtualFile';
export { default as Mount } from './Mount';
export { default as DiskBackend } from './DiskBackend';
export { default as MemoryBackend } from './MemoryBackend';
export { default as MemoryNode } from './MemoryNode';
export { default as MapHandleCache } from './MapHandleCache';
export { default as LRUHandleCache } from './LRUHandleCache';
export { default as DelegatingHandleCache } from './DelegatingHandleCache';
export { default as HandleCacheRegistry } from './HandleCacheRegistry';
export { default as config } from './config';
export * as constants from './constants';
export * as errors from './errors';
export * as traversal from './traversal';
export * as utils from './utils';
export * as types from './types';
