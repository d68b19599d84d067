/**
 * Config validation (Zod) and deep merge utility.
 *
 * Validates config files at load time. Invalid values are dropped (so the
 * default takes over) and reported as issues; unknown keys are preserved.
 */

import { z } from 'zod';

// ---------- Deep merge ----------

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Recursively merge `source` into `target`.
 * - Objects are merged recursively (not replaced)
 * - Arrays and primitives from `source` override `target`
 * - `undefined` values in source are skipped
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = result[key];

    if (srcVal === undefined) continue;

    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else {
      result[key] = srcVal;
    }
  }

  return result;
}

// ---------- Zod schemas ----------

const PathsSchema = z
  .object({
    level1_dir: z.string().min(1).optional(),
    level2_dir: z.string().min(1).optional(),
    level3_dir: z.string().min(1).optional(),
    fixed_effects_template: z.string().min(1).optional(),
    mixed_effects_template: z.string().min(1).optional(),
    standard_image: z.string().min(1).optional(),
    log_dir: z.string().min(1).optional(),
  })
  .passthrough()
  .optional();

const NamingSchema = z
  .object({
    subject_patterns: z.array(z.string().min(1)).nonempty().optional(),
    session_patterns: z.array(z.string().min(1)).nonempty().optional(),
  })
  .passthrough()
  .optional();

const ThresholdsSchema = z
  .object({
    z: z.number().positive().optional(),
    cluster_p: z.number().gt(0).max(1).optional(),
  })
  .passthrough()
  .optional();

const FailurePolicySchema = z.enum(['abort', 'continue']);

const EngineSchema = z
  .object({
    command: z.string().min(1).optional(),
    fixed_effects_on_failure: FailurePolicySchema.optional(),
    mixed_effects_on_failure: FailurePolicySchema.optional(),
  })
  .passthrough()
  .optional();

const LimitsSchema = z
  .object({
    min_runs: z.number().int().positive().optional(),
    min_inputs: z.number().int().positive().optional(),
  })
  .passthrough()
  .optional();

const ErrorReportingSchema = z
  .object({
    enabled: z.boolean().optional(),
    level: z.enum(['error', 'warn', 'info', 'debug']).optional(),
    max_file_size_mb: z.number().positive().optional(),
  })
  .passthrough()
  .optional();

/** Top-level config file schema. Every section is optional. */
export const FeatwiseConfigFileSchema = z
  .object({
    paths: PathsSchema,
    naming: NamingSchema,
    thresholds: ThresholdsSchema,
    engine: EngineSchema,
    limits: LimitsSchema,
    error_reporting: ErrorReportingSchema,
  })
  .passthrough();

export type FeatwiseConfigFile = z.infer<typeof FeatwiseConfigFileSchema>;

export interface ConfigValidationResult {
  config: FeatwiseConfigFile;
  issues: string[];
}

/** Delete the value an issue points at, stopping at the first non-object container. */
function dropPath(target: Record<string, unknown>, issuePath: Array<string | number>): boolean {
  let current = target;
  for (let i = 0; i < issuePath.length; i++) {
    const key = String(issuePath[i]);
    if (!(key in current)) return false;
    const next = current[key];
    if (i < issuePath.length - 1 && isPlainObject(next)) {
      current = next;
      continue;
    }
    delete current[key];
    return true;
  }
  return false;
}

/**
 * Validate a parsed config object. Never throws: offending values are removed
 * so defaults apply, and each problem is returned as a human-readable issue.
 */
export function validateConfig(raw: Record<string, unknown>): ConfigValidationResult {
  const issues: string[] = [];
  const working = structuredClone(raw);

  // Each pass removes at least one offending value, so this terminates
  for (;;) {
    const result = FeatwiseConfigFileSchema.safeParse(working);
    if (result.success) {
      return { config: result.data, issues };
    }

    let dropped = false;
    for (const issue of result.error.issues) {
      issues.push(`Invalid config value at "${issue.path.join('.')}": ${issue.message}`);
      if (dropPath(working, issue.path)) dropped = true;
    }
    if (!dropped) {
      return { config: {}, issues };
    }
  }
}
