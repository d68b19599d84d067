/**
 * Configuration system for featwise
 *
 * Core configuration loading and dataset-root resolution.
 * Type definitions are in config-types.ts
 * Default values are in config-defaults.ts
 * Display functions are in config-display.ts
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { deepMerge, isPlainObject, validateConfig, type FeatwiseConfigFile } from './config-validation.js';
import { logWarn } from './fault-logger.js';
import type { FeatwiseConfig, PathsConfig, ErrorReportingConfig } from './config-types.js';
import { DEFAULT_CONFIG } from './config-defaults.js';

export type {
  EngineFailurePolicy,
  FaultLevel,
  PathsConfig,
  NamingConfig,
  ThresholdsConfig,
  EngineConfig,
  LimitsConfig,
  ErrorReportingConfig,
  FeatwiseConfig,
  ConfigDisplay,
} from './config-types.js';

export { DEFAULT_CONFIG, DEFAULT_SUBJECT_PATTERNS, DEFAULT_SESSION_PATTERNS } from './config-defaults.js';

// ============================================================================
// Dataset root
// ============================================================================

let datasetRootOverride: string | null = null;

/** Pin the dataset root (from `--base-dir`). `null` restores auto-detection. */
export function setDatasetRoot(dir: string | null): void {
  datasetRootOverride = dir ? path.resolve(dir) : null;
  invalidateConfigCache();
}

/**
 * Resolve the dataset root.
 * Resolution: --base-dir → FEATWISE_BASE_DIR → nearest ancestor holding
 * dataset_description.json or derivatives/ → cwd
 */
export function getDatasetRoot(): string {
  if (datasetRootOverride) return datasetRootOverride;

  const envRoot = process.env.FEATWISE_BASE_DIR;
  if (envRoot && fs.existsSync(envRoot)) {
    return path.resolve(envRoot);
  }

  let dir = process.cwd();
  while (dir !== path.dirname(dir)) {
    if (
      fs.existsSync(path.join(dir, 'dataset_description.json')) ||
      fs.existsSync(path.join(dir, 'derivatives'))
    ) {
      return dir;
    }
    dir = path.dirname(dir);
  }

  return process.cwd();
}

export function getGlobalConfigPath(): string {
  return path.join(os.homedir(), '.featwise', 'config.json');
}

export function getDatasetConfigPath(root: string = getDatasetRoot()): string {
  return path.join(root, 'code', 'featwise.json');
}

// ============================================================================
// Loading
// ============================================================================

// Config cache: avoids re-reading files on every getConfig() call
let configCache: {
  config: FeatwiseConfig;
  root: string;
  globalMtime: number;
  datasetMtime: number;
} | null = null;

/** Invalidate config cache (for tests or after config changes) */
export function invalidateConfigCache(): void {
  configCache = null;
}

function getFileMtime(filePath: string): number {
  try {
    return fs.statSync(filePath).mtimeMs;
  } catch {
    return 0;
  }
}

function readConfigFile(filePath: string, issues: string[]): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (isPlainObject(parsed)) return parsed;
    issues.push(`Ignoring ${filePath}: top level must be a JSON object`);
  } catch (error) {
    issues.push(`Ignoring ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return {};
}

/** Fill every missing or invalid field of a validated config file from the defaults. */
export function resolveConfig(file: FeatwiseConfigFile): FeatwiseConfig {
  const d = DEFAULT_CONFIG;
  return {
    paths: {
      level1_dir: file.paths?.level1_dir ?? d.paths.level1_dir,
      level2_dir: file.paths?.level2_dir ?? d.paths.level2_dir,
      level3_dir: file.paths?.level3_dir ?? d.paths.level3_dir,
      fixed_effects_template: file.paths?.fixed_effects_template ?? d.paths.fixed_effects_template,
      mixed_effects_template: file.paths?.mixed_effects_template ?? d.paths.mixed_effects_template,
      standard_image: file.paths?.standard_image ?? d.paths.standard_image,
      log_dir: file.paths?.log_dir ?? d.paths.log_dir,
    },
    naming: {
      subject_patterns: file.naming?.subject_patterns ?? d.naming.subject_patterns,
      session_patterns: file.naming?.session_patterns ?? d.naming.session_patterns,
    },
    thresholds: {
      z: file.thresholds?.z ?? d.thresholds.z,
      cluster_p: file.thresholds?.cluster_p ?? d.thresholds.cluster_p,
    },
    engine: {
      command: file.engine?.command ?? d.engine.command,
      fixed_effects_on_failure: file.engine?.fixed_effects_on_failure ?? d.engine.fixed_effects_on_failure,
      mixed_effects_on_failure: file.engine?.mixed_effects_on_failure ?? d.engine.mixed_effects_on_failure,
    },
    limits: {
      min_runs: file.limits?.min_runs ?? d.limits.min_runs,
      min_inputs: file.limits?.min_inputs ?? d.limits.min_inputs,
    },
    error_reporting: {
      enabled: file.error_reporting?.enabled ?? d.error_reporting.enabled,
      level: file.error_reporting?.level ?? d.error_reporting.level,
      max_file_size_mb: file.error_reporting?.max_file_size_mb ?? d.error_reporting.max_file_size_mb,
    },
  };
}

export function getConfig(): FeatwiseConfig {
  const root = getDatasetRoot();
  const globalConfigPath = getGlobalConfigPath();
  const datasetConfigPath = getDatasetConfigPath(root);

  // Check if cache is still valid (stat is cheaper than read+parse)
  if (
    configCache &&
    configCache.root === root &&
    configCache.globalMtime === getFileMtime(globalConfigPath) &&
    configCache.datasetMtime === getFileMtime(datasetConfigPath)
  ) {
    return configCache.config;
  }

  const issues: string[] = [];
  const merged = deepMerge(
    readConfigFile(globalConfigPath, issues),
    readConfigFile(datasetConfigPath, issues)
  );
  const validated = validateConfig(merged);
  issues.push(...validated.issues);

  const result = resolveConfig(validated.config);

  configCache = {
    config: result,
    root,
    globalMtime: getFileMtime(globalConfigPath),
    datasetMtime: getFileMtime(datasetConfigPath),
  };

  // Logged after caching: the fault logger reads config itself
  for (const issue of issues) {
    logWarn('config', issue);
  }

  return result;
}

// ============================================================================
// Derived values
// ============================================================================

/** Resolve a dataset-relative path; absolute paths pass through. */
export function resolveDatasetPath(p: string, root: string = getDatasetRoot()): string {
  return path.isAbsolute(p) ? p : path.join(root, p);
}

export function getResolvedPaths(): Record<keyof PathsConfig, string> {
  const { paths } = getConfig();
  const root = getDatasetRoot();
  return {
    level1_dir: resolveDatasetPath(paths.level1_dir, root),
    level2_dir: resolveDatasetPath(paths.level2_dir, root),
    level3_dir: resolveDatasetPath(paths.level3_dir, root),
    fixed_effects_template: resolveDatasetPath(paths.fixed_effects_template, root),
    mixed_effects_template: resolveDatasetPath(paths.mixed_effects_template, root),
    standard_image: resolveDatasetPath(paths.standard_image, root),
    log_dir: resolveDatasetPath(paths.log_dir, root),
  };
}

export function getLogDir(): string {
  return resolveDatasetPath(getConfig().paths.log_dir);
}

export function getErrorReportingConfig(): ErrorReportingConfig {
  return getConfig().error_reporting;
}
