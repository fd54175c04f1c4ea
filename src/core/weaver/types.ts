/**
 * @arch patternloom.core.types
 */
import type { Logger } from '../../utils/logger.js';
import type { Capability, Component, Intent } from '../catalog/index.js';
import type { Pattern, PatternMetrics } from '../patterns/index.js';

/**
 * Components per requested capability, most popular first.
 * Only capabilities with at least one match are present; keys keep
 * the order of the intent.
 */
export type CapabilityMatches = ReadonlyMap<Capability, readonly Component[]>;

/**
 * Weights of the multi-objective score. Cost, complexity and license risk
 * are inverted (lower is better) before weighting.
 */
export interface ScoringWeights {
  security: number;
  cost: number;
  complexity: number;
  maturity: number;
  license_risk: number;
}

export interface WovenPattern {
  pattern: Pattern;
  metrics: PatternMetrics;
  /** Multi-objective score of the pattern's components */
  score: number;
}

export interface WeaveResult {
  /** Sorted by confidence, highest first; empty means no patterns found */
  patterns: WovenPattern[];
  matchedCapabilities: Capability[];
  missingCapabilities: Capability[];
}

export interface TemplateContext {
  intent: Intent;
  matches: CapabilityMatches;
}

/**
 * Builds one pattern from the matches, or null when its anchors are missing.
 */
export type PatternTemplate = (context: TemplateContext) => Pattern | null;

export interface PatternWeaverOptions {
  weights?: Partial<ScoringWeights>;
  logger?: Logger;
}
