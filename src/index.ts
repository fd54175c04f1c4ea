/**
 * @arch patternloom.barrel
 *
 * patternloom: recommend, evolve and audit architecture patterns.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Catalog model and graph
export * from './core/catalog/index.js';
export * from './core/graph/index.js';

// Patterns
export * from './core/patterns/index.js';
export * from './core/weaver/index.js';
export * from './core/evolver/index.js';
export * from './core/auditor/index.js';

// Context object
export * from './core/loom.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
