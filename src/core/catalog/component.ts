/**
 * @arch patternloom.core.domain
 *
 * Constructors for catalog values. Defaults are applied here, once,
 * so every Component in the system has all six scores.
 */
import { ConstraintError, ErrorCodes } from '../../utils/errors.js';
import { uniqueCapabilities, type Capability } from './capabilities.js';
import type {
  Component,
  ComponentInput,
  ComponentScores,
  Intent,
  IntentInput,
  Relationship,
  RelationshipInput,
  ScoreField,
} from './types.js';

export const DEFAULT_SCORE = 0.5;

function checkUnitInterval(value: number, field: string, owner: string): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConstraintError(
      ErrorCodes.INVALID_SCORE,
      `${field} for '${owner}' must be between 0 and 1, got ${value}`,
      { owner, field, value }
    );
  }
  return value;
}

/**
 * Build a Component, applying defaults and checking score ranges.
 */
export function createComponent(input: ComponentInput): Component {
  const name = input.name.trim();
  if (name.length === 0) {
    throw new ConstraintError(
      ErrorCodes.MALFORMED_ENTRY,
      'Component name must be non-empty',
      { input: input.name }
    );
  }

  const score = (field: ScoreField): number =>
    checkUnitInterval(input[field] ?? DEFAULT_SCORE, field, name);
  const scores: ComponentScores = {
    popularityScore: score('popularityScore'),
    securityScore: score('securityScore'),
    costScore: score('costScore'),
    complexityScore: score('complexityScore'),
    maturityScore: score('maturityScore'),
    licenseRiskScore: score('licenseRiskScore'),
  };

  return {
    name,
    description: input.description ?? '',
    githubUrl: input.githubUrl,
    license: input.license,
    capabilities: uniqueCapabilities(input.capabilities ?? []),
    compatibilityTags: [...(input.compatibilityTags ?? [])],
    metadata: { ...(input.metadata ?? {}) },
    ...scores,
  };
}

export function createRelationship(input: RelationshipInput): Relationship {
  const strength = checkUnitInterval(
    input.strength ?? 1.0,
    'strength',
    `${input.source} -> ${input.target}`
  );
  return {
    source: input.source,
    target: input.target,
    type: input.type,
    strength,
    evidence: input.evidence,
  };
}

/**
 * Build a frozen Intent. An intent without capabilities cannot be woven.
 */
export function createIntent(input: IntentInput): Intent {
  const requiredCapabilities = uniqueCapabilities(input.requiredCapabilities);
  if (requiredCapabilities.length === 0) {
    throw new ConstraintError(
      ErrorCodes.EMPTY_CAPABILITIES,
      'An intent must require at least one capability',
      { description: input.description }
    );
  }

  return Object.freeze({
    description: input.description,
    requiredCapabilities: Object.freeze(requiredCapabilities),
    constraints: Object.freeze({ ...(input.constraints ?? {}) }),
    priority: input.priority ?? 'medium',
  });
}

export function hasCapability(component: Component, capability: Capability): boolean {
  return component.capabilities.includes(capability);
}

/**
 * Lookup key for a component name: case-folded, spaces and underscores unified.
 * `"Apache Kafka"`, `"apache_kafka"` and `"Apache_Kafka"` share a key.
 */
export function componentKey(name: string): string {
  return name.trim().toLowerCase().replace(/[\s_]+/g, '_');
}
