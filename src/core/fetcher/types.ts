/**
 * Repository fetcher contract.
 */

/**
 * Retrieves template repositories from a version-control remote.
 * Each call is a single attempt: no retries, no partial success.
 * Failures are reported as FetchError with a distinguishable reason.
 */
export interface RepositoryFetcher {
  /** Clone `sourceLocation` into `destinationPath`, which must be absent or empty. */
  clone(sourceLocation: string, destinationPath: string): Promise<void>;
  /** Bring an existing working copy up to date with its remote. */
  pull(existingPath: string): Promise<void>;
}

export interface GitFetcherOptions {
  /** Abort a clone or pull after this many milliseconds (0 = no limit) */
  timeoutMs?: number;
  /** Clone with `--depth 1` */
  shallow?: boolean;
}
