/**
 * @arch patternloom.core.domain
 */
import type { CatalogReader } from '../graph/index.js';
import { computeMetrics } from './metrics.js';
import type { Pattern } from './pattern.js';
import type { PatternSummary } from './types.js';

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Display-ready view of a pattern: rounded metrics, per-component license
 * and popularity, and every edge between its components.
 */
export function describePattern(
  pattern: Pattern,
  graph: Pick<CatalogReader, 'getEdge' | 'getConnections'>
): PatternSummary {
  const metrics = computeMetrics(pattern, graph);
  return {
    name: pattern.name,
    description: pattern.description,
    complexity: round3(metrics.complexity),
    confidence: round3(metrics.confidence),
    components: pattern.components.map(({ component, role }) => ({
      name: component.name,
      role,
      capabilities: [...component.capabilities],
      license: component.license ?? 'Unknown',
      popularity: component.popularityScore,
    })),
    connections: graph.getConnections(pattern.componentNames()).map((edge) => ({
      from: edge.source,
      to: edge.target,
      type: edge.type,
      strength: edge.strength,
      evidence: edge.evidence ?? '',
    })),
    tags: pattern.tags,
    notes: [...pattern.notes],
  };
}
