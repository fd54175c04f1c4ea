/**
 * @arch patternloom.core.domain
 *
 * add-security: swap components for more secure ones, then add
 * authentication and monitoring where missing.
 */
import { componentKey, type Component } from '../../catalog/index.js';
import type { CatalogReader } from '../../graph/index.js';
import { Pattern, averageScore } from '../../patterns/index.js';
import { MONITORING_COMPONENTS, SECURITY_UPGRADES, lookupTable } from '../tables.js';
import type { Transformation } from '../types.js';
import { best, formatScore } from './helpers.js';

function meanSecurity(pattern: Pattern): number {
  return averageScore(
    pattern.components.map((slot) => slot.component),
    'securityScore'
  );
}

/**
 * Upgrade target for a component. Requires a strictly higher security score
 * and a target not already in the pattern.
 */
function securityUpgrade(
  component: Component,
  source: Pattern,
  evolved: Pattern,
  graph: CatalogReader
): Component | undefined {
  const targetName = lookupTable(SECURITY_UPGRADES, component.name, componentKey);
  if (!targetName) return undefined;
  const target = graph.resolveComponent(targetName);
  if (!target || target === component) return undefined;
  if (source.hasComponent(target.name) || evolved.hasComponent(target.name)) return undefined;
  return target.securityScore > component.securityScore ? target : undefined;
}

function addMonitoring(evolved: Pattern, graph: CatalogReader, notes: string[]): void {
  const metrics = graph.resolveComponent(MONITORING_COMPONENTS.metrics);
  const visualization = graph.resolveComponent(MONITORING_COMPONENTS.visualization);

  if (!metrics && !visualization) {
    const fallback = best(graph.findByCapability('monitoring'), 'securityScore');
    if (fallback && !evolved.hasComponent(fallback.name)) {
      evolved.addComponent(fallback, 'Security Monitoring & Metrics');
      notes.push(`Added ${fallback.name} for security monitoring`);
    }
    return;
  }
  if (metrics && !evolved.hasComponent(metrics.name)) {
    evolved.addComponent(metrics, 'Security Monitoring & Metrics');
    notes.push(`Added ${metrics.name} for security monitoring`);
  }
  if (visualization && !evolved.hasComponent(visualization.name)) {
    evolved.addComponent(visualization, 'Security Dashboard & Visualization');
    notes.push(`Added ${visualization.name} for security visualization`);
  }
}

export const harden: Transformation = {
  name: 'add-security',
  aliases: ['harden'],
  metric: 'security',

  apply(source: Pattern, graph: CatalogReader) {
    const pattern = new Pattern({
      name: `${source.name} (Secure)`,
      description: `${source.description} - Enhanced for security`,
      intent: source.intent,
      tags: source.tags,
      notes: source.notes,
    });
    const notes: string[] = [];

    for (const { component, role } of source.components) {
      const upgrade = securityUpgrade(component, source, pattern, graph);
      if (upgrade) {
        pattern.addComponent(upgrade, `${role} (Security Enhanced)`);
        notes.push(`Upgraded ${component.name}→${upgrade.name} for security`);
      } else {
        pattern.addComponent(component, role);
      }
    }

    if (!source.hasCapability('authentication')) {
      const auth = best(graph.findByCapability('authentication'), 'securityScore');
      if (auth && !pattern.hasComponent(auth.name)) {
        pattern.addComponent(auth, 'Authentication & Identity Management');
        notes.push(
          `Added ${auth.name} for authentication (security: ${formatScore(auth.securityScore)})`
        );
      }
    }

    if (source.hasCapability('web_framework') && !source.hasCapability('monitoring')) {
      addMonitoring(pattern, graph, notes);
    }

    const before = meanSecurity(source);
    const after = meanSecurity(pattern);
    if (after > before) {
      notes.push(
        `Security score: ${formatScore(before)}→${formatScore(after)} (+${formatScore(after - before)})`
      );
    }

    if (notes.length > 0) {
      pattern.description += `. Security enhancements: ${notes.slice(0, 3).join(', ')}`;
      pattern.addNotes(...notes);
    }
    pattern.addTags('secure', 'evolved', 'high_security');
    return { pattern, notes };
  },

  measure(pattern) {
    return meanSecurity(pattern);
  },

  delta(before, after) {
    return after - before;
  },
};
