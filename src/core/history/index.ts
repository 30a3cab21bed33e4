/**
 * History reset exports barrel file.
 */
export { RepositoryReinitializer, DEFAULT_COMMIT_MESSAGE } from './reinitializer.js';
export type { ResetHistoryOptions, ResetHistoryResult } from './reinitializer.js';
