/**
 * @arch patternloom.core.barrel
 *
 * Pattern synthesis exports.
 */
export * from './types.js';
export * from './domains.js';
export * from './roles.js';
export * from './templates.js';
export * from './scoring.js';
export { PatternWeaver } from './weaver.js';
