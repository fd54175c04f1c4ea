/**
 * @arch patternloom.core.domain
 * @intent:stateless
 *
 * Audit report building and rendering. Pure functions of the finding list.
 */
import { ErrorCodes, SystemError } from '../../utils/errors.js';
import { stringifyJson } from '../../utils/json.js';
import { passes } from './auditor.js';
import {
  AUDIT_CATEGORIES,
  AUDIT_SEVERITIES,
  type AuditCategory,
  type AuditFinding,
  type AuditReport,
  type AuditReportFormat,
  type AuditSeverity,
  type AuditSummary,
} from './types.js';

const RULE = '='.repeat(50);
const SUB_RULE = '-'.repeat(30);

export function summarizeFindings(findings: readonly AuditFinding[]): AuditSummary {
  const bySeverity: Record<AuditSeverity, number> = { critical: 0, error: 0, warning: 0, info: 0 };
  const byCategory: Partial<Record<AuditCategory, number>> = {};
  for (const finding of findings) {
    bySeverity[finding.severity]++;
    byCategory[finding.category] = (byCategory[finding.category] ?? 0) + 1;
  }
  return { total: findings.length, bySeverity, byCategory, passed: passes(findings) };
}

/**
 * Findings grouped by severity (most severe first), then by category in
 * the fixed category order. Finding order is kept inside each group.
 */
export function buildAuditReport(findings: readonly AuditFinding[]): AuditReport {
  const groups: AuditReport['groups'] = [];
  for (const severity of AUDIT_SEVERITIES) {
    const ofSeverity = findings.filter((finding) => finding.severity === severity);
    if (ofSeverity.length === 0) continue;

    const categories = AUDIT_CATEGORIES.map((category) => ({
      category,
      findings: ofSeverity.filter((finding) => finding.category === category),
    })).filter((group) => group.findings.length > 0);

    groups.push({ severity, categories });
  }
  return { summary: summarizeFindings(findings), groups };
}

function renderText(findings: readonly AuditFinding[]): string {
  if (findings.length === 0) {
    return 'No issues found. Pattern looks good!';
  }

  const report = buildAuditReport(findings);
  const lines: string[] = ['ARCHITECTURE AUDIT REPORT', RULE];

  for (const group of report.groups) {
    const count = report.summary.bySeverity[group.severity];
    lines.push('', `${group.severity.toUpperCase()} (${count})`, SUB_RULE);
    for (const { findings: grouped } of group.categories) {
      for (const finding of grouped) {
        lines.push(`- [${finding.category}] ${finding.message}`);
        if (finding.components.length > 0) {
          lines.push(`  Components: ${finding.components.join(', ')}`);
        }
        lines.push(`  Recommendation: ${finding.recommendation}`);
        if (finding.evidence) {
          lines.push(`  Evidence: ${finding.evidence}`);
        }
      }
    }
  }

  lines.push('', RULE, 'SUMMARY', `Total findings: ${report.summary.total}`);
  for (const severity of AUDIT_SEVERITIES) {
    const count = report.summary.bySeverity[severity];
    if (count > 0) lines.push(`  ${severity}: ${count}`);
  }
  lines.push(`Result: ${report.summary.passed ? 'PASS' : 'FAIL'}`);
  return lines.join('\n');
}

function isReportFormat(format: string): format is AuditReportFormat {
  return format === 'text' || format === 'json';
}

/**
 * @throws SystemError UNKNOWN_FORMAT for anything but `text` or `json`
 */
export function renderAuditReport(findings: readonly AuditFinding[], format: string = 'text'): string {
  if (!isReportFormat(format)) {
    throw new SystemError(
      ErrorCodes.UNKNOWN_FORMAT,
      `Unsupported report format: '${format}'. Expected text or json`,
      { format }
    );
  }
  return format === 'json' ? stringifyJson(buildAuditReport(findings)) : renderText(findings);
}
