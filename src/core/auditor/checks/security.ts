/**
 * @arch patternloom.core.domain
 * @intent:stateless
 *
 * Security check: average security score and missing authentication.
 */
import { averageScore } from '../../patterns/index.js';
import type { AuditCheck, AuditContext, AuditFinding } from '../types.js';

const LOW_AVERAGE_SECURITY = 0.75;
const LOW_COMPONENT_SECURITY = 0.7;

export const securityCheck: AuditCheck = {
  id: 'security',
  name: 'Security Check',
  category: 'security',
  check({ pattern }: AuditContext): AuditFinding[] {
    const findings: AuditFinding[] = [];
    const components = pattern.components.map((slot) => slot.component);
    if (components.length === 0) return findings;

    const average = averageScore(components, 'securityScore');
    if (average < LOW_AVERAGE_SECURITY) {
      const weak = components.filter((c) => c.securityScore < LOW_COMPONENT_SECURITY);
      findings.push({
        category: 'security',
        severity: 'warning',
        components: weak.map((c) => c.name),
        message: `Low average security score: ${average.toFixed(2)}`,
        recommendation: 'Consider higher-security alternatives or add security components',
        evidence:
          weak.length > 0
            ? `Components: ${weak.map((c) => `${c.name} (${c.securityScore.toFixed(2)})`).join(', ')}`
            : 'Components: All components',
      });
    }

    if (pattern.hasCapability('web_framework') && !pattern.hasCapability('authentication')) {
      findings.push({
        category: 'security',
        severity: 'error',
        components: pattern.componentsWithCapability('web_framework').map((c) => c.name),
        message: 'Missing authentication component in web application',
        recommendation: 'Add an authentication service (Keycloak, Ory Kratos, etc.)',
        evidence: 'Web framework present without authentication',
      });
    }

    return findings;
  },
};
