/**
 * @arch patternloom.core.domain
 *
 * Conversion between catalog records (exchange format) and in-memory values.
 * Records are written field by field from a fixed list, so nothing that lives
 * only in memory ever reaches a snapshot.
 */
import { formatZodError } from '../../utils/yaml.js';
import { getErrorMessage } from '../../utils/errors.js';
import { parseCapability, parseRelationshipType, type Capability } from './capabilities.js';
import { createComponent, createRelationship } from './component.js';
import {
  COMPONENT_RECORD_FIELDS,
  ComponentRecordSchema,
  RelationshipRecordSchema,
} from './schema.js';
import type { Component, Relationship } from './types.js';

export type DecodeResult<T> =
  | { ok: true; value: T; warnings: string[] }
  | { ok: false; error: string };

/**
 * Exchange-format record for one component, in the order it is written.
 */
export interface ComponentRecordOut {
  description: string;
  github_url: string | null;
  capabilities: Capability[];
  license: string | null;
  popularity_score: number;
  security_score: number;
  compatibility_tags: string[];
  metadata: Record<string, unknown>;
  cost_score: number;
  complexity_score: number;
  maturity_score: number;
  license_risk_score: number;
}

export interface RelationshipRecordOut {
  source: string;
  target: string;
  type: string;
  strength: number;
  evidence: string | null;
}

/**
 * Decode one catalog entry. `key` is the map key in the name-keyed form.
 */
export function componentFromRecord(raw: unknown, key?: string): DecodeResult<Component> {
  const parsed = ComponentRecordSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: formatZodError(parsed.error) };
  }

  const record = parsed.data;
  const name = record.name ?? key;
  if (!name || name.trim().length === 0) {
    return { ok: false, error: 'missing component name' };
  }

  const warnings: string[] = [];
  const capabilities: Capability[] = [];
  for (const text of record.capabilities ?? []) {
    const capability = parseCapability(text);
    if (capability) {
      capabilities.push(capability);
    } else {
      warnings.push(`${name}: ignored unknown capability '${text}'`);
    }
  }

  // Unknown fields are kept, not dropped
  const metadata: Record<string, unknown> = { ...(record.metadata ?? {}) };
  for (const [field, value] of Object.entries(record)) {
    if (!COMPONENT_RECORD_FIELDS.has(field) && !(field in metadata)) {
      metadata[field] = value;
    }
  }

  try {
    const component = createComponent({
      name,
      description: record.description ?? '',
      githubUrl: record.github_url ?? undefined,
      license: record.license ?? undefined,
      capabilities,
      compatibilityTags: record.compatibility_tags ?? [],
      metadata,
      popularityScore: record.popularity_score ?? undefined,
      securityScore: record.security_score ?? undefined,
      costScore: record.cost_score ?? undefined,
      complexityScore: record.complexity_score ?? undefined,
      maturityScore: record.maturity_score ?? undefined,
      licenseRiskScore: record.license_risk_score ?? undefined,
    });
    return { ok: true, value: component, warnings };
  } catch (error) {
    return { ok: false, error: getErrorMessage(error) };
  }
}

export function componentToRecord(component: Component): ComponentRecordOut {
  return {
    description: component.description,
    github_url: component.githubUrl ?? null,
    capabilities: [...component.capabilities],
    license: component.license ?? null,
    popularity_score: component.popularityScore,
    security_score: component.securityScore,
    compatibility_tags: [...component.compatibilityTags],
    metadata: { ...component.metadata },
    cost_score: component.costScore,
    complexity_score: component.complexityScore,
    maturity_score: component.maturityScore,
    license_risk_score: component.licenseRiskScore,
  };
}

export function relationshipFromRecord(raw: unknown): DecodeResult<Relationship> {
  const parsed = RelationshipRecordSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: formatZodError(parsed.error) };
  }

  const record = parsed.data;
  const typeText = record.type ?? record.relationship_type;
  if (!typeText) {
    return { ok: false, error: `${record.source} -> ${record.target}: missing relationship type` };
  }
  const type = parseRelationshipType(typeText);
  if (!type) {
    return {
      ok: false,
      error: `${record.source} -> ${record.target}: unknown relationship type '${typeText}'`,
    };
  }

  return {
    ok: true,
    value: createRelationship({
      source: record.source,
      target: record.target,
      type,
      strength: record.strength ?? undefined,
      evidence: record.evidence ?? undefined,
    }),
    warnings: [],
  };
}

export function relationshipToRecord(relationship: Relationship): RelationshipRecordOut {
  return {
    source: relationship.source,
    target: relationship.target,
    type: relationship.type,
    strength: relationship.strength,
    evidence: relationship.evidence ?? null,
  };
}
