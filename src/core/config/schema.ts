/**
 * @arch patternloom.core.domain.schema
 */
import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * This helper makes the field optional and applies schema defaults when undefined.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

const WeightSchema = z.number().min(0).max(1);

/** Catalog snapshot locations, relative to the project root. */
export const CatalogConfigSchema = z.object({
  components: z.string().default('.loom/catalog.json'),
  relationships: z.string().default('.loom/relationships.json'),
});

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
});

/** Multi-objective scoring weights. */
export const ScoringWeightsSchema = z.object({
  security: WeightSchema.default(0.4),
  cost: WeightSchema.default(0.15),
  complexity: WeightSchema.default(0.15),
  maturity: WeightSchema.default(0.2),
  license_risk: WeightSchema.default(0.1),
});

export const ScoringConfigSchema = z.object({
  weights: withDefaults(ScoringWeightsSchema),
});

/**
 * Complete .loom/config.yaml schema.
 */
export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  catalog: withDefaults(CatalogConfigSchema),
  logging: withDefaults(LoggingConfigSchema),
  scoring: withDefaults(ScoringConfigSchema),
});

/** An empty config file parses to null and means "all defaults". */
export const ConfigFileSchema = withDefaults(ConfigSchema);

// Type exports
export type Config = z.infer<typeof ConfigSchema>;
export type CatalogConfig = z.infer<typeof CatalogConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ScoringConfig = z.infer<typeof ScoringConfigSchema>;
