/**
 * @arch patternloom.core.domain
 * @intent:stateless
 */
import type { Component } from '../catalog/index.js';
import type { ScoringWeights } from './types.js';

export const DEFAULT_SCORING_WEIGHTS: Readonly<ScoringWeights> = {
  security: 0.4,
  cost: 0.15,
  complexity: 0.15,
  maturity: 0.2,
  license_risk: 0.1,
};

/**
 * Resolve partial weights. No weights (or an empty object) means the
 * defaults; otherwise any weight left out counts as 0.
 */
export function resolveWeights(weights?: Partial<ScoringWeights>): ScoringWeights {
  if (!weights || Object.keys(weights).length === 0) {
    return { ...DEFAULT_SCORING_WEIGHTS };
  }
  return {
    security: weights.security ?? 0,
    cost: weights.cost ?? 0,
    complexity: weights.complexity ?? 0,
    maturity: weights.maturity ?? 0,
    license_risk: weights.license_risk ?? 0,
  };
}

/**
 * Mean multi-objective score of the components; 0 for an empty list.
 */
export function calculateWeightedScore(
  components: readonly Component[],
  weights?: Partial<ScoringWeights>
): number {
  if (components.length === 0) return 0;
  const w = resolveWeights(weights);

  let total = 0;
  for (const component of components) {
    total +=
      w.security * component.securityScore +
      w.cost * (1 - component.costScore) +
      w.complexity * (1 - component.complexityScore) +
      w.maturity * component.maturityScore +
      w.license_risk * (1 - component.licenseRiskScore);
  }
  return total / components.length;
}
