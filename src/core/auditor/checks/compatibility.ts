/**
 * @arch patternloom.core.domain
 * @intent:stateless
 *
 * Compatibility check: weak compatible_with edges and incompatible pairs.
 */
import type { AuditCheck, AuditContext, AuditFinding } from '../types.js';

const LOW_COMPATIBILITY = 0.7;

export const compatibilityCheck: AuditCheck = {
  id: 'compatibility',
  name: 'Compatibility Check',
  category: 'compatibility',
  check({ pattern, graph }: AuditContext): AuditFinding[] {
    const findings: AuditFinding[] = [];
    const components = pattern.components.map((slot) => slot.component);

    components.forEach((source, i) => {
      components.forEach((target, j) => {
        if (i === j) return;
        const edge = graph.getEdge(source.name, target.name);
        if (!edge) return;

        if (edge.type === 'compatible_with' && edge.strength < LOW_COMPATIBILITY) {
          findings.push({
            category: 'compatibility',
            severity: 'warning',
            components: [source.name, target.name],
            message: `Low compatibility confidence (${edge.strength.toFixed(2)}) between ${source.name} and ${target.name}`,
            recommendation: 'Consider alternative pairings or verify integration',
            evidence: edge.evidence,
          });
        } else if (edge.type === 'incompatible_with') {
          findings.push({
            category: 'compatibility',
            severity: 'error',
            components: [source.name, target.name],
            message: `Incompatible components: ${source.name} and ${target.name}`,
            recommendation: 'Replace one of the components',
            evidence: edge.evidence,
          });
        }
      });
    });

    return findings;
  },
};
