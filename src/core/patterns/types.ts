/**
 * @arch patternloom.core.types
 *
 * Pattern model types.
 */
import type { Capability, Component, Diagnostic, RelationshipType } from '../catalog/index.js';
import type { Pattern } from './pattern.js';

/**
 * One slot in a pattern. The component is a shared catalog value; patterns
 * never copy or change it.
 */
export interface PatternComponent {
  readonly component: Component;
  readonly role: string;
}

/**
 * Derived scores, recomputed from the pattern and the graph on every call.
 */
export interface PatternMetrics {
  /** In [0, 1]; grows with component and internal edge count */
  complexity: number;
  /** In [0, 1]; popularity plus compatibility, with a security boost */
  confidence: number;
}

// ---------------------------------------------------------------------------
// Exchange format
// ---------------------------------------------------------------------------

export interface PatternComponentRecord {
  name: string;
  role: string;
  capabilities: Capability[];
}

export interface PatternRecord {
  name: string;
  description: string;
  components: PatternComponentRecord[];
  tags: string[];
  evolution_notes: string[];
}

export interface PatternLoadResult {
  pattern: Pattern;
  /** One entry per component that could not be resolved or decoded */
  diagnostics: Diagnostic[];
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export interface PatternConnection {
  from: string;
  to: string;
  type: RelationshipType;
  strength: number;
  evidence: string;
}

export interface PatternSummary {
  name: string;
  description: string;
  /** Rounded to three decimals */
  complexity: number;
  /** Rounded to three decimals */
  confidence: number;
  components: Array<{
    name: string;
    role: string;
    capabilities: Capability[];
    license: string;
    popularity: number;
  }>;
  connections: PatternConnection[];
  tags: string[];
  notes: string[];
}
