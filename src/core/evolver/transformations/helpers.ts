/**
 * @arch patternloom.core.domain
 */
import type { Component, ScoreField } from '../../catalog/index.js';

/**
 * Highest-scoring component; the earliest wins a tie.
 */
export function best(components: readonly Component[], field: ScoreField): Component | undefined {
  let winner: Component | undefined;
  for (const component of components) {
    if (!winner || component[field] > winner[field]) {
      winner = component;
    }
  }
  return winner;
}

export function formatScore(value: number): string {
  return value.toFixed(2);
}
