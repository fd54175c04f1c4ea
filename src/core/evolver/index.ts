/**
 * @arch patternloom.core.barrel
 *
 * Pattern evolution exports.
 */
export * from './types.js';
export * from './tables.js';
export * from './cost.js';
export { scaleOut, harden, costOptimize } from './transformations/index.js';
export {
  PatternEvolver,
  normalizeTransformationName,
  listTransformationNames,
} from './evolver.js';
