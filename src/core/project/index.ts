/**
 * Project pipeline exports barrel file.
 */
export { ProjectService, validateProjectName, type ProjectServiceDeps } from './service.js';
export { createProjectService, type ProjectServiceOverrides } from './factory.js';
export type {
  AuthorIdentity,
  CreateProjectOptions,
  CreationReport,
  ProjectDefaults,
  RefreshResult,
} from './types.js';
