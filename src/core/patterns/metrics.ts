/**
 * @arch patternloom.core.domain
 * @intent:stateless
 *
 * Complexity and confidence of a pattern against the graph it was built from.
 */
import type { Component, ScoreField } from '../catalog/index.js';
import type { CatalogReader } from '../graph/index.js';
import type { Pattern } from './pattern.js';
import type { PatternMetrics } from './types.js';

const COMPONENT_COMPLEXITY = 0.1;
const EDGE_COMPLEXITY = 0.05;
const POPULARITY_WEIGHT = 0.7;
const COMPATIBILITY_WEIGHT = 0.3;
const SECURITY_BOOST = 0.2;

/**
 * Mean of one score across the components; 0 for an empty list.
 */
export function averageScore(components: readonly Component[], field: ScoreField): number {
  if (components.length === 0) return 0;
  let sum = 0;
  for (const component of components) {
    sum += component[field];
  }
  return sum / components.length;
}

export function computeMetrics(
  pattern: Pattern,
  graph: Pick<CatalogReader, 'getEdge'>
): PatternMetrics {
  const components = pattern.components.map((slot) => slot.component);
  if (components.length === 0) {
    return { complexity: 0, confidence: 0 };
  }

  // Ordered pairs of distinct slots; each direction counts separately
  let internalEdges = 0;
  let compatibilitySum = 0;
  let compatibilityEdges = 0;
  components.forEach((source, i) => {
    components.forEach((target, j) => {
      if (i === j || source.name === target.name) return;
      const edge = graph.getEdge(source.name, target.name);
      if (!edge) return;
      internalEdges++;
      if (edge.type === 'compatible_with') {
        compatibilitySum += edge.strength;
        compatibilityEdges++;
      }
    });
  });

  const complexity = Math.min(
    1,
    COMPONENT_COMPLEXITY * components.length + EDGE_COMPLEXITY * internalEdges
  );

  let confidence =
    POPULARITY_WEIGHT * averageScore(components, 'popularityScore') +
    COMPATIBILITY_WEIGHT * (compatibilitySum / Math.max(1, compatibilityEdges));

  if (pattern.intent?.requiredCapabilities.includes('high_security')) {
    confidence += averageScore(components, 'securityScore') * SECURITY_BOOST;
  }

  return { complexity, confidence: Math.min(1, confidence) };
}
