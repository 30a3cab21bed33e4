/**
 * Cache module exports.
 */
export { TemplateCache } from './manager.js';
export { KeyedLock } from './lock.js';
export type { CacheEntry, TemplateCacheOptions } from './types.js';
