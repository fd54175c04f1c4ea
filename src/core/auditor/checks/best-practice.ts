/**
 * @arch patternloom.core.domain
 * @intent:stateless
 *
 * Best-practice check: caching next to a database, and monitoring.
 */
import type { AuditCheck, AuditContext, AuditFinding } from '../types.js';

const MIN_COMPONENTS = 3;

export const bestPracticeCheck: AuditCheck = {
  id: 'best-practice',
  name: 'Best Practice Check',
  category: 'best-practice',
  check({ pattern }: AuditContext): AuditFinding[] {
    const findings: AuditFinding[] = [];
    if (pattern.size < MIN_COMPONENTS) return findings;

    const databases = pattern.componentsWithCapability('database').map((c) => c.name);
    if (databases.length > 0 && !pattern.hasCapability('cache')) {
      findings.push({
        category: 'best-practice',
        severity: 'info',
        components: databases,
        message: 'Database present without caching layer',
        recommendation: 'Consider adding Redis for caching to improve performance',
        evidence: `Database components: ${databases.join(', ')}`,
      });
    }

    if (!pattern.hasCapability('monitoring')) {
      findings.push({
        category: 'best-practice',
        severity: 'info',
        components: [],
        message: 'No monitoring/observability components',
        recommendation: 'Add monitoring (Prometheus) and visualization (Grafana)',
        evidence: `Current components: ${pattern.componentNames().join(', ')}`,
      });
    }

    return findings;
  },
};
