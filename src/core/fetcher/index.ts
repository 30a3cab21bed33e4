/**
 * Repository fetcher exports barrel file.
 */
export { GitFetcher } from './git-fetcher.js';
export { classifyGitFailure } from './classify.js';
export type { RepositoryFetcher, GitFetcherOptions } from './types.js';
