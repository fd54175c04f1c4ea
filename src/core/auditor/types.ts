/**
 * @arch patternloom.core.types
 *
 * Audit finding, check and report types.
 */
import type { Logger } from '../../utils/logger.js';
import type { Diagnostic } from '../catalog/index.js';
import type { CatalogReader } from '../graph/index.js';
import type { Pattern } from '../patterns/index.js';

// ---------------------------------------------------------------------------
// Categories & Severities
// ---------------------------------------------------------------------------

export const AUDIT_CATEGORIES = [
  'compatibility',
  'license',
  'security',
  'redundancy',
  'best-practice',
  'performance',
] as const;

export type AuditCategory = (typeof AUDIT_CATEGORIES)[number];

/** Most severe first; reports list groups in this order */
export const AUDIT_SEVERITIES = ['critical', 'error', 'warning', 'info'] as const;

export type AuditSeverity = (typeof AUDIT_SEVERITIES)[number];

const FAILING_SEVERITIES: ReadonlySet<AuditSeverity> = new Set(['critical', 'error']);

export function isFailingSeverity(severity: AuditSeverity): boolean {
  return FAILING_SEVERITIES.has(severity);
}

// ---------------------------------------------------------------------------
// Findings
// ---------------------------------------------------------------------------

export interface AuditFinding {
  category: AuditCategory;
  severity: AuditSeverity;
  /** Offending component names; empty for pattern-wide findings */
  components: string[];
  message: string;
  recommendation: string;
  evidence?: string;
}

// ---------------------------------------------------------------------------
// Check Interface
// ---------------------------------------------------------------------------

export const AUDIT_CHECK_NAMES = [
  'compatibility',
  'license',
  'security',
  'redundancy',
  'best-practice',
] as const;

export type AuditCheckName = (typeof AUDIT_CHECK_NAMES)[number];

export interface AuditContext {
  pattern: Pattern;
  graph: CatalogReader;
}

export interface AuditCheck {
  id: AuditCheckName;
  name: string;
  category: AuditCategory;
  check(context: AuditContext): AuditFinding[];
}

export interface AuditOptions {
  /** Run only these checks, in the standard order */
  checks?: readonly string[];
}

export interface AuditFileResult {
  pattern: Pattern;
  findings: AuditFinding[];
  /** Pattern entries skipped while loading */
  diagnostics: Diagnostic[];
}

export interface PatternAuditorOptions {
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

export interface AuditSummary {
  total: number;
  bySeverity: Record<AuditSeverity, number>;
  byCategory: Partial<Record<AuditCategory, number>>;
  passed: boolean;
}

export interface AuditReport {
  summary: AuditSummary;
  /** Non-empty severities, most severe first, each split by category */
  groups: Array<{
    severity: AuditSeverity;
    categories: Array<{ category: AuditCategory; findings: AuditFinding[] }>;
  }>;
}

export type AuditReportFormat = 'text' | 'json';
