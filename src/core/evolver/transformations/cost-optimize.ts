/**
 * @arch patternloom.core.domain
 *
 * optimize-cost: lighter or permissively licensed replacements, then
 * consolidation of small monitoring stacks.
 */
import { componentKey, isSourceAvailableLicense, type Component } from '../../catalog/index.js';
import type { CatalogReader } from '../../graph/index.js';
import { Pattern } from '../../patterns/index.js';
import { patternCost } from '../cost.js';
import {
  COST_DOWNGRADES,
  MONITORING_COMPONENTS,
  PERMISSIVE_ALTERNATIVES,
  lookupTable,
} from '../tables.js';
import type { Transformation } from '../types.js';
import { formatScore } from './helpers.js';

const CONSOLIDATION_LIMIT = 4;

function resolveFrom(
  table: Readonly<Record<string, string>>,
  component: Component,
  graph: CatalogReader
): Component | undefined {
  const targetName = lookupTable(table, component.name, componentKey);
  return targetName ? graph.resolveComponent(targetName) : undefined;
}

/**
 * The downgrade table wins; the license table is consulted only when the
 * downgrade table has no usable entry.
 */
function cheaperAlternative(component: Component, graph: CatalogReader): Component | undefined {
  const downgrade = resolveFrom(COST_DOWNGRADES, component, graph);
  if (downgrade) return downgrade;
  if (isSourceAvailableLicense(component.license)) {
    return resolveFrom(PERMISSIVE_ALTERNATIVES, component, graph);
  }
  return undefined;
}

function consolidate(pattern: Pattern, notes: string[]): void {
  const metrics = pattern.components.find(
    (slot) => componentKey(slot.component.name) === componentKey(MONITORING_COMPONENTS.metrics)
  );
  const visualization = pattern.components.find(
    (slot) =>
      componentKey(slot.component.name) === componentKey(MONITORING_COMPONENTS.visualization)
  );
  if (metrics && visualization && pattern.size <= CONSOLIDATION_LIMIT) {
    const removed = visualization.component.name;
    pattern.removeComponent(removed);
    notes.push(
      `Consolidated: Removed ${removed} (using ${metrics.component.name} only for simplicity)`
    );
  }

  if (pattern.componentsWithCapability('database').length > 1) {
    notes.push('Multiple databases detected - consider consolidation');
  }
}

export const costOptimize: Transformation = {
  name: 'optimize-cost',
  aliases: ['cost-optimize'],
  metric: 'cost',

  apply(source: Pattern, graph: CatalogReader) {
    const pattern = new Pattern({
      name: `${source.name} (Cost-Optimized)`,
      description: `${source.description} - Optimized for cost efficiency`,
      intent: source.intent,
      tags: source.tags,
      notes: source.notes,
    });
    const notes: string[] = [];

    for (const { component, role } of source.components) {
      const alternative = cheaperAlternative(component, graph);
      if (
        alternative &&
        alternative !== component &&
        !source.hasComponent(alternative.name) &&
        !pattern.hasComponent(alternative.name)
      ) {
        pattern.addComponent(alternative, `${role} (Cost-Optimized)`);
        notes.push(`Replaced ${component.name}→${alternative.name} for cost savings`);
      } else {
        pattern.addComponent(component, role);
      }
    }

    consolidate(pattern, notes);

    const before = patternCost(source);
    const after = patternCost(pattern);
    const savings = before - after;
    if (savings > 0) {
      notes.push(
        `Cost efficiency: ${formatScore(before)}→${formatScore(after)} (+${formatScore(savings)} savings)`
      );
    }

    if (notes.length > 0) {
      pattern.description += `. Cost optimizations: ${notes.slice(0, 3).join(', ')}`;
      pattern.addNotes(...notes);
    }
    pattern.addTags('cost-optimized', 'evolved', 'budget_friendly');
    return { pattern, notes };
  },

  measure(pattern) {
    return patternCost(pattern);
  },

  delta(before, after) {
    return before - after;
  },
};
