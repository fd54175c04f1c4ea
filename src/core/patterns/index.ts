/**
 * @arch patternloom.core.barrel
 *
 * Pattern model exports.
 */
export * from './types.js';
export * from './pattern.js';
export * from './metrics.js';
export * from './describe.js';
export * from './serializer.js';
export { PatternComponentRecordSchema, PatternFileSchema } from './schema.js';
