/**
 * Splitter Configuration Schema
 *
 * Zod schemas for a single experiment's splitter and for a file listing
 * several experiments. Only `salt` is required; groups default to a 50/50
 * control/test split.
 */

import { z } from 'zod';
import { invalidArgument } from './errors.js';
import type { WeightSpec } from './types.js';

// =============================================================================
// Configuration Schema
// =============================================================================

const groupWeightSchema = z.object({
  label: z.string().min(1),
  weight: z.number().finite().nonnegative(),
});

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

const splitterShape = z.object({
  /** Experiment name, used by the registry and in log lines */
  name: z.string().min(1).optional(),
  /** Per-experiment salt; must stay constant for the experiment's lifetime */
  salt: z.string(),
  /** Two-way split: share routed to "test" */
  testShare: z.number().min(0).max(1).optional(),
  /** Explicit ordered groups (mutually exclusive with testShare) */
  groups: z.array(groupWeightSchema).min(2).optional(),
});

function exclusiveWeights(config: { testShare?: number; groups?: unknown[] }): boolean {
  return config.testShare === undefined || config.groups === undefined;
}

const exclusiveWeightsIssue = {
  message: 'testShare and groups are mutually exclusive',
  path: ['groups'],
};

export const splitterConfigSchema = splitterShape
  .extend({
    /** Log level applied when the config is loaded */
    logLevel: logLevelSchema.optional(),
  })
  .refine(exclusiveWeights, exclusiveWeightsIssue);

/** A registry entry: same as a splitter config, but the name is required */
export const experimentConfigSchema = splitterShape
  .extend({ name: z.string().min(1) })
  .refine(exclusiveWeights, exclusiveWeightsIssue);

export const experimentsFileSchema = z.object({
  logLevel: logLevelSchema.optional(),
  experiments: z.array(experimentConfigSchema),
});

// =============================================================================
// Type Export
// =============================================================================

export type SplitterConfig = z.infer<typeof splitterConfigSchema>;
export type SplitterConfigInput = z.input<typeof splitterConfigSchema>;
export type ExperimentConfig = z.infer<typeof experimentConfigSchema>;
export type ExperimentsFile = z.infer<typeof experimentsFileSchema>;

// =============================================================================
// Config Helpers
// =============================================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validate a config, turning zod failures into INVALID_ARGUMENT.
 */
function parseWith<T>(schema: z.ZodType<T>, field: string, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw invalidArgument(field, input, issues.join('; '), issues);
  }
  return result.data;
}

/**
 * Parse and validate a splitter configuration.
 */
export function parseSplitterConfig(input: unknown): SplitterConfig {
  return parseWith(splitterConfigSchema, 'config', input);
}

/**
 * Parse and validate a single registry entry.
 */
export function parseExperimentConfig(input: unknown): ExperimentConfig {
  return parseWith(experimentConfigSchema, 'experiment', input);
}

/**
 * Parse and validate an experiments file document.
 */
export function parseExperimentsFile(input: unknown): ExperimentsFile {
  return parseWith(experimentsFileSchema, 'experiments', input);
}

/**
 * Weight specification described by a config (undefined means the default split).
 */
export function getWeightSpec(config: Pick<SplitterConfig, 'testShare' | 'groups'>): WeightSpec | undefined {
  if (config.groups !== undefined) {
    return config.groups;
  }
  if (config.testShare !== undefined) {
    return { testShare: config.testShare };
  }
  return undefined;
}
