/**
 * @arch patternloom.test.unit
 */
import { describe, it, expect } from 'vitest';
import {
  buildAuditReport,
  renderAuditReport,
  summarizeFindings,
  type AuditFinding,
} from '../../../../src/core/auditor/index.js';
import { SystemError } from '../../../../src/utils/errors.js';

const authError: AuditFinding = {
  category: 'security',
  severity: 'error',
  components: ['FastAPI'],
  message: 'Missing authentication component in web application',
  recommendation: 'Add an authentication service (Keycloak, Ory Kratos, etc.)',
  evidence: 'Web framework present without authentication',
};

const licenseWarning: AuditFinding = {
  category: 'license',
  severity: 'warning',
  components: ['Grafana'],
  message: 'Restrictive license detected: AGPL',
  recommendation: 'Consider open source alternatives with permissive licenses',
};

const monitoringInfo: AuditFinding = {
  category: 'best-practice',
  severity: 'info',
  components: [],
  message: 'No monitoring/observability components',
  recommendation: 'Add monitoring (Prometheus) and visualization (Grafana)',
};

const compatibilityWarning: AuditFinding = {
  category: 'compatibility',
  severity: 'warning',
  components: ['FastAPI', 'Redis'],
  message: 'Low compatibility confidence (0.60) between FastAPI and Redis',
  recommendation: 'Consider alternative pairings or verify integration',
};

describe('summarizeFindings', () => {
  it('should count by severity and category', () => {
    const summary = summarizeFindings([authError, licenseWarning, compatibilityWarning]);

    expect(summary).toEqual({
      total: 3,
      bySeverity: { critical: 0, error: 1, warning: 2, info: 0 },
      byCategory: { security: 1, license: 1, compatibility: 1 },
      passed: false,
    });
  });

  it('should pass when only warnings and info remain', () => {
    expect(summarizeFindings([licenseWarning, monitoringInfo]).passed).toBe(true);
    expect(summarizeFindings([]).passed).toBe(true);
  });
});

describe('buildAuditReport', () => {
  it('should group by severity, then by category order', () => {
    const report = buildAuditReport([monitoringInfo, licenseWarning, authError, compatibilityWarning]);

    expect(report.groups).toEqual([
      { severity: 'error', categories: [{ category: 'security', findings: [authError] }] },
      {
        severity: 'warning',
        categories: [
          { category: 'compatibility', findings: [compatibilityWarning] },
          { category: 'license', findings: [licenseWarning] },
        ],
      },
      { severity: 'info', categories: [{ category: 'best-practice', findings: [monitoringInfo] }] },
    ]);
  });
});

describe('renderAuditReport', () => {
  it('should render a clean result', () => {
    expect(renderAuditReport([])).toBe('No issues found. Pattern looks good!');
  });

  it('should render grouped text with a summary', () => {
    const text = renderAuditReport([monitoringInfo, authError]);

    expect(text.split('\n')).toEqual([
      'ARCHITECTURE AUDIT REPORT',
      '='.repeat(50),
      '',
      'ERROR (1)',
      '-'.repeat(30),
      '- [security] Missing authentication component in web application',
      '  Components: FastAPI',
      '  Recommendation: Add an authentication service (Keycloak, Ory Kratos, etc.)',
      '  Evidence: Web framework present without authentication',
      '',
      'INFO (1)',
      '-'.repeat(30),
      '- [best-practice] No monitoring/observability components',
      '  Recommendation: Add monitoring (Prometheus) and visualization (Grafana)',
      '',
      '='.repeat(50),
      'SUMMARY',
      'Total findings: 2',
      '  error: 1',
      '  info: 1',
      'Result: FAIL',
    ]);
  });

  it('should render the report as JSON', () => {
    const parsed: unknown = JSON.parse(renderAuditReport([licenseWarning], 'json'));

    expect(parsed).toEqual({
      summary: {
        total: 1,
        bySeverity: { critical: 0, error: 0, warning: 1, info: 0 },
        byCategory: { license: 1 },
        passed: true,
      },
      groups: [
        { severity: 'warning', categories: [{ category: 'license', findings: [licenseWarning] }] },
      ],
    });
  });

  it('should reject unknown formats', () => {
    expect(() => renderAuditReport([], 'html')).toThrow(SystemError);
    expect(() => renderAuditReport([], 'html')).toThrow(
      "Unsupported report format: 'html'. Expected text or json"
    );
  });
});
