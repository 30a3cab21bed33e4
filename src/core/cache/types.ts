/**
 * Types for the on-disk template cache.
 * One working copy per identifier at <cacheRoot>/<identifier>/.
 */
import type { RepositoryFetcher } from '../fetcher/types.js';

/**
 * A cached template working copy. Derived from the filesystem, never stored.
 */
export interface CacheEntry {
  identifier: string;
  /** Absolute path of the working copy */
  path: string;
  /** When the entry was last fetched or refreshed */
  lastFetchedAt: Date;
}

export interface TemplateCacheOptions {
  /** Directory holding one working copy per template identifier */
  cacheRoot: string;
  fetcher: RepositoryFetcher;
  /** Refresh entries older than updateIntervalDays on use */
  autoUpdate?: boolean;
  updateIntervalDays?: number;
  /** Clock, for staleness checks */
  now?: () => Date;
}
