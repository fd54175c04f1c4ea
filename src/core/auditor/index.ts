/**
 * @arch patternloom.core.barrel
 *
 * Pattern audit exports.
 */
export * from './types.js';
export * from './report.js';
export {
  compatibilityCheck,
  licenseCheck,
  securityCheck,
  redundancyCheck,
  bestPracticeCheck,
} from './checks/index.js';
export { PatternAuditor, passes } from './auditor.js';
