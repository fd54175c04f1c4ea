/**
 * @arch patternloom.core.domain.schema
 *
 * Zod schemas for the catalog exchange format.
 */
import { z } from 'zod';

const ScoreSchema = z.number().min(0).max(1).nullish();

/**
 * One component record. Field names follow the exchange format;
 * unknown fields pass through and are folded into metadata on load.
 */
export const ComponentRecordSchema = z.object({
  /** Present in the flat list form; the map form carries the name as key */
  name: z.string().optional(),
  description: z.string().nullish(),
  github_url: z.string().nullish(),
  capabilities: z.array(z.string()).nullish(),
  license: z.string().nullish(),
  popularity_score: ScoreSchema,
  security_score: ScoreSchema,
  compatibility_tags: z.array(z.string()).nullish(),
  metadata: z.record(z.string(), z.unknown()).nullish(),
  cost_score: ScoreSchema,
  complexity_score: ScoreSchema,
  maturity_score: ScoreSchema,
  license_risk_score: ScoreSchema,
}).passthrough();

export const COMPONENT_RECORD_FIELDS: ReadonlySet<string> = new Set(
  Object.keys(ComponentRecordSchema.shape)
);

/**
 * Catalog file: either `{ "<name>": {...} }` or `[{ "name": ..., ... }]`.
 * Entries stay unknown here so each one is validated on its own.
 */
export const CatalogFileSchema = z.union([
  z.array(z.unknown()),
  z.record(z.string(), z.unknown()),
]);

export const RelationshipRecordSchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1),
  /** `relationship_type` is accepted for older snapshots */
  type: z.string().optional(),
  relationship_type: z.string().optional(),
  strength: z.number().min(0).max(1).nullish(),
  evidence: z.string().nullish(),
});

export const RELATIONSHIPS_SCHEMA_VERSION = 1;

/**
 * Relationship file: `{ schema_version, relationships: [...] }`, or a bare list.
 */
export const RelationshipsFileSchema = z.union([
  z.array(z.unknown()),
  z.object({
    schema_version: z.number().int().optional(),
    relationships: z.array(z.unknown()).default([]),
  }),
]);

// Type exports
export type ComponentRecord = z.infer<typeof ComponentRecordSchema>;
export type RelationshipRecord = z.infer<typeof RelationshipRecordSchema>;
