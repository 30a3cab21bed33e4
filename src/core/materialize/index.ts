/**
 * Materializer exports barrel file.
 */
export { ProjectMaterializer, VCS_METADATA_DIRS } from './materializer.js';
export type {
  CopyFileFn,
  MaterializerOptions,
  MaterializeOptions,
  MaterializeResult,
} from './materializer.js';
