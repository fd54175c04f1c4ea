/**
 * @arch patternloom.core.barrel
 */
export { scaleOut } from './scale-out.js';
export { harden } from './harden.js';
export { costOptimize } from './cost-optimize.js';
