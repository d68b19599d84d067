/**
 * Configuration types for featwise
 *
 * File-level config (`~/.featwise/config.json`, `<dataset>/code/featwise.json`)
 * is a deep partial of `FeatwiseConfig`; `getConfig()` always returns the
 * fully resolved shape.
 */

export type EngineFailurePolicy = 'abort' | 'continue';
export type FaultLevel = 'error' | 'warn' | 'info' | 'debug';

/** Dataset-relative locations (absolute paths are kept as-is) */
export interface PathsConfig {
  level1_dir: string;
  level2_dir: string;
  level3_dir: string;
  fixed_effects_template: string;
  mixed_effects_template: string;
  standard_image: string;
  log_dir: string;
}

export interface NamingConfig {
  /** Glob patterns that identify subject directories */
  subject_patterns: string[];
  /** Glob patterns (or literal names) that identify session directories */
  session_patterns: string[];
}

export interface ThresholdsConfig {
  z: number;
  cluster_p: number;
}

export interface EngineConfig {
  /** Executable invoked with the design file as its only argument */
  command: string;
  fixed_effects_on_failure: EngineFailurePolicy;
  mixed_effects_on_failure: EngineFailurePolicy;
}

export interface LimitsConfig {
  /** Fewest runs a subject-session needs for fixed effects */
  min_runs: number;
  /** Fewest inputs a group analysis needs */
  min_inputs: number;
}

export interface ErrorReportingConfig {
  enabled: boolean;
  level: FaultLevel;
  max_file_size_mb: number;
}

export interface FeatwiseConfig {
  paths: PathsConfig;
  naming: NamingConfig;
  thresholds: ThresholdsConfig;
  engine: EngineConfig;
  limits: LimitsConfig;
  error_reporting: ErrorReportingConfig;
}

/** Effective configuration plus where it came from, for `featwise config` */
export interface ConfigDisplay {
  sources: {
    dataset_root: string;
    global: string;
    dataset: string;
    env: string[];
  };
  resolved_paths: Record<keyof PathsConfig, string>;
  config: FeatwiseConfig;
}
