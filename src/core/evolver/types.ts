/**
 * @arch patternloom.core.types
 */
import type { Logger } from '../../utils/logger.js';
import type { CatalogReader } from '../graph/index.js';
import type { Pattern } from '../patterns/index.js';

export const TRANSFORMATION_NAMES = ['make-scalable', 'add-security', 'optimize-cost'] as const;

export type TransformationName = (typeof TRANSFORMATION_NAMES)[number];

/** What a transformation's before/after numbers measure */
export type EvolutionMetric = 'complexity' | 'security' | 'cost';

export interface TransformationOutcome {
  pattern: Pattern;
  /** Notes added by this step only */
  notes: string[];
}

export interface Transformation {
  name: TransformationName;
  aliases: readonly string[];
  metric: EvolutionMetric;
  /** Build the evolved pattern; the source is left untouched */
  apply(source: Pattern, graph: CatalogReader): TransformationOutcome;
  measure(pattern: Pattern, graph: CatalogReader): number;
  /** Positive means the objective improved */
  delta(before: number, after: number): number;
}

export interface EvolutionResult {
  pattern: Pattern;
  transformation: TransformationName;
  notes: string[];
  metric: EvolutionMetric;
  before: number;
  after: number;
  delta: number;
}

export interface EvolutionChain {
  /** Result of the last step */
  pattern: Pattern;
  steps: EvolutionResult[];
}

export interface PatternEvolverOptions {
  logger?: Logger;
}
