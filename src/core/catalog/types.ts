/**
 * @arch patternloom.core.types
 *
 * Catalog record types: components, relationships and intents.
 */
import type { ErrorCode } from '../../utils/errors.js';
import type { Capability, RelationshipType } from './capabilities.js';

/**
 * The scalar quality scores carried by every component, each in [0, 1].
 */
export interface ComponentScores {
  popularityScore: number;
  securityScore: number;
  costScore: number;
  complexityScore: number;
  maturityScore: number;
  licenseRiskScore: number;
}

export type ScoreField = keyof ComponentScores;

/**
 * One open-source building block in the catalog. Keyed by name in the graph.
 * Patterns hold references to components and never mutate them.
 */
export interface Component extends ComponentScores {
  name: string;
  description: string;
  githubUrl?: string;
  license?: string;
  /** Unique; order irrelevant */
  capabilities: Capability[];
  compatibilityTags: string[];
  metadata: Record<string, unknown>;
}

/**
 * Input accepted by createComponent. Everything but the name is optional.
 */
export type ComponentInput = Pick<Component, 'name'> &
  Partial<Omit<Component, 'name'>>;

/**
 * Directed, typed edge between two component names.
 */
export interface Relationship {
  source: string;
  target: string;
  type: RelationshipType;
  /** In [0, 1] */
  strength: number;
  evidence?: string;
}

export type RelationshipInput = Omit<Relationship, 'strength'> & {
  strength?: number;
};

export type IntentPriority = 'low' | 'medium' | 'high' | 'critical';

/**
 * A capability-based request. Immutable once constructed.
 */
export interface Intent {
  readonly description: string;
  readonly requiredCapabilities: readonly Capability[];
  readonly constraints: Readonly<Record<string, unknown>>;
  readonly priority: IntentPriority;
}

export interface IntentInput {
  description: string;
  requiredCapabilities: readonly Capability[];
  constraints?: Readonly<Record<string, unknown>>;
  priority?: IntentPriority;
}

/**
 * A recoverable problem (skipped entry, unknown reference) reported
 * alongside a result instead of being thrown.
 */
export interface Diagnostic {
  code: ErrorCode;
  message: string;
  /** Component name, `source -> target`, or index of the offending entry */
  entry?: string;
  /** File the entry came from */
  file?: string;
}
