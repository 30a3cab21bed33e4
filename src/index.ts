/**
 * seedling - project creation from language templates.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Template registry
export * from './core/registry/index.js';

// Repository fetching and caching
export * from './core/fetcher/index.js';
export * from './core/cache/index.js';

// Project pipeline stages
export * from './core/materialize/index.js';
export * from './core/substitution/index.js';
export * from './core/history/index.js';
export * from './core/project/index.js';

// Utilities
export * from './utils/index.js';
