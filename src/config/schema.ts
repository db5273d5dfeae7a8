/**
 * Zod schemas for user-facing configuration (config.json).
 *
 * Validates `~/.config/agent-timeline/config.json` and
 * `.agent-timeline/config.json`.
 */

import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '../utilities/logger.js';

// =============================================================================
// SECTION SCHEMAS
// =============================================================================

const NormalizerSchema = z
  .object({
    /**
     * Text before an embedded workspace JSON object shorter than this makes
     * the message "primarily JSON". Tunable heuristic, 20 by default.
     */
    primaryJsonPrefixThreshold: z.number().int().nonnegative().optional(),
  })
  .strict();

const DisplaySchema = z
  .object({
    previewLength: z.number().int().positive().optional(),
  })
  .strict();

const BatchingSchema = z
  .object({
    enabled: z.boolean().optional(),
    skipTools: z.array(z.string().min(1)).optional(),
  })
  .strict();

const PlanningSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .strict();

const LoggingSchema = z
  .object({
    level: z.enum(LOG_LEVELS).optional(),
    file: z.string().optional(),
  })
  .strict();

// =============================================================================
// TOP-LEVEL CONFIG SCHEMA
// =============================================================================

/**
 * Uses `.passthrough()` at the top level so unknown keys survive;
 * section schemas use `.strict()` to catch typos.
 */
export const UserConfigSchema = z
  .object({
    normalizer: NormalizerSchema.optional(),
    display: DisplaySchema.optional(),
    batching: BatchingSchema.optional(),
    planning: PlanningSchema.optional(),
    logging: LoggingSchema.optional(),
  })
  .passthrough();

export type ValidatedUserConfig = z.infer<typeof UserConfigSchema>;

// =============================================================================
// RESOLVED CONFIG
// =============================================================================

/**
 * Config with every default applied, as consumed by the pipeline.
 */
export interface TimelineConfig {
  normalizer: { primaryJsonPrefixThreshold: number };
  display: { previewLength: number };
  batching: { enabled: boolean; skipTools: string[] };
  planning: { enabled: boolean };
  logging: { level: LogLevel; file?: string };
}

export const DEFAULT_CONFIG: TimelineConfig = {
  normalizer: { primaryJsonPrefixThreshold: 20 },
  display: { previewLength: 100 },
  batching: { enabled: true, skipTools: [] },
  planning: { enabled: true },
  logging: { level: 'warn' },
};

export function resolveConfig(config: ValidatedUserConfig = {}): TimelineConfig {
  return {
    normalizer: {
      primaryJsonPrefixThreshold:
        config.normalizer?.primaryJsonPrefixThreshold ??
        DEFAULT_CONFIG.normalizer.primaryJsonPrefixThreshold,
    },
    display: {
      previewLength: config.display?.previewLength ?? DEFAULT_CONFIG.display.previewLength,
    },
    batching: {
      enabled: config.batching?.enabled ?? DEFAULT_CONFIG.batching.enabled,
      skipTools: [...(config.batching?.skipTools ?? DEFAULT_CONFIG.batching.skipTools)],
    },
    planning: {
      enabled: config.planning?.enabled ?? DEFAULT_CONFIG.planning.enabled,
    },
    logging: {
      level: config.logging?.level ?? DEFAULT_CONFIG.logging.level,
      ...(config.logging?.file !== undefined && { file: config.logging.file }),
    },
  };
}
