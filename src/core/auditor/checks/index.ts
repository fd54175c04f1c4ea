/**
 * @arch patternloom.core.barrel
 *
 * Barrel export for all audit checks.
 */
export { compatibilityCheck } from './compatibility.js';
export { licenseCheck } from './license.js';
export { securityCheck } from './security.js';
export { redundancyCheck } from './redundancy.js';
export { bestPracticeCheck } from './best-practice.js';
