/**
 * @arch patternloom.core.domain.schema
 *
 * Zod schemas for the pattern exchange format.
 */
import { z } from 'zod';

export const PatternComponentRecordSchema = z.object({
  name: z.string().min(1),
  role: z.string().default('Unknown'),
  /** Informational only; components are re-resolved by name */
  capabilities: z.array(z.string()).optional(),
});

/**
 * Component entries stay unknown here so a bad entry only skips itself.
 */
export const PatternFileSchema = z.object({
  name: z.string().default('Unnamed Pattern'),
  description: z.string().default(''),
  components: z.array(z.unknown()).default([]),
  tags: z.array(z.string()).default([]),
  evolution_notes: z.array(z.string()).optional(),
  /** Older files use this key for the same list */
  transformation_notes: z.array(z.string()).optional(),
}).passthrough();

// Type exports
export type PatternComponentRecordInput = z.infer<typeof PatternComponentRecordSchema>;
export type PatternFile = z.infer<typeof PatternFileSchema>;
