/**
 * @arch patternloom.core.domain
 * @intent:stateless
 *
 * Redundancy check: several components providing one capability.
 */
import type { Capability } from '../../catalog/index.js';
import type { AuditCheck, AuditContext, AuditFinding } from '../types.js';

/** Plural databases and caches are often intentional */
const PLURAL_ALLOWED: ReadonlySet<Capability> = new Set(['database', 'cache']);

export const redundancyCheck: AuditCheck = {
  id: 'redundancy',
  name: 'Redundancy Check',
  category: 'redundancy',
  check({ pattern }: AuditContext): AuditFinding[] {
    const findings: AuditFinding[] = [];

    const providers = new Map<Capability, string[]>();
    for (const { component } of pattern.components) {
      for (const capability of component.capabilities) {
        const names = providers.get(capability) ?? [];
        names.push(component.name);
        providers.set(capability, names);
      }
    }

    for (const [capability, names] of providers) {
      if (names.length > 1 && !PLURAL_ALLOWED.has(capability)) {
        findings.push({
          category: 'redundancy',
          severity: 'warning',
          components: names,
          message: `Multiple components providing same capability: ${capability}`,
          recommendation: `Consider consolidating ${capability} functionality`,
          evidence: `Provided by: ${names.join(', ')}`,
        });
      }
    }

    const databases = providers.get('database') ?? [];
    if (databases.length > 1) {
      findings.push({
        category: 'redundancy',
        severity: 'info',
        components: databases,
        message: `Multiple databases detected: ${databases.length}`,
        recommendation: 'Ensure multiple databases are intentional (e.g., polyglot persistence)',
        evidence: `Databases: ${databases.join(', ')}`,
      });
    }

    return findings;
  },
};
