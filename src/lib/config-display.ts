/**
 * Configuration display and formatting functions
 */

import fs from 'fs';
import type { ConfigDisplay } from './config-types.js';
import {
  getConfig,
  getDatasetRoot,
  getDatasetConfigPath,
  getGlobalConfigPath,
  getResolvedPaths,
} from './config.js';

/**
 * Get full configuration with all defaults applied
 */
export function getConfigDisplay(): ConfigDisplay {
  const globalPath = getGlobalConfigPath();
  const datasetPath = getDatasetConfigPath();

  const envVars: string[] = [];
  if (process.env.FEATWISE_BASE_DIR) envVars.push('FEATWISE_BASE_DIR');

  return {
    sources: {
      dataset_root: getDatasetRoot(),
      global: fs.existsSync(globalPath) ? globalPath : '(not found)',
      dataset: fs.existsSync(datasetPath) ? datasetPath : '(not found)',
      env: envVars,
    },
    resolved_paths: getResolvedPaths(),
    config: getConfig(),
  };
}

/**
 * Format config display as human-readable text
 */
export function formatConfigDisplay(display: ConfigDisplay): string {
  const { sources, resolved_paths: paths, config } = display;
  const lines: string[] = [];

  lines.push('## Sources');
  lines.push(`  Dataset root: ${sources.dataset_root}`);
  lines.push(`  Global config: ${sources.global}`);
  lines.push(`  Dataset config: ${sources.dataset}`);
  if (sources.env.length > 0) {
    lines.push(`  Environment: ${sources.env.join(', ')}`);
  }

  lines.push('');
  lines.push('## Paths');
  lines.push(`  Level-1 analyses: ${paths.level1_dir}`);
  lines.push(`  Level-2 analyses: ${paths.level2_dir}`);
  lines.push(`  Level-3 analyses: ${paths.level3_dir}`);
  lines.push(`  Fixed-effects template: ${paths.fixed_effects_template}`);
  lines.push(`  Mixed-effects template: ${paths.mixed_effects_template}`);
  lines.push(`  Standard image: ${paths.standard_image}`);
  lines.push(`  Logs: ${paths.log_dir}`);

  lines.push('');
  lines.push('## Naming');
  lines.push(`  Subjects: ${config.naming.subject_patterns.join(' ')}`);
  lines.push(`  Sessions: ${config.naming.session_patterns.join(' ')}`);

  lines.push('');
  lines.push('## Analysis');
  lines.push(`  Z threshold: ${config.thresholds.z}`);
  lines.push(`  Cluster P threshold: ${config.thresholds.cluster_p}`);
  lines.push(`  Minimum runs (fixed effects): ${config.limits.min_runs}`);
  lines.push(`  Minimum inputs (mixed effects): ${config.limits.min_inputs}`);

  lines.push('');
  lines.push('## Engine');
  lines.push(`  Command: ${config.engine.command}`);
  lines.push(`  On failure (fixed effects): ${config.engine.fixed_effects_on_failure}`);
  lines.push(`  On failure (mixed effects): ${config.engine.mixed_effects_on_failure}`);

  lines.push('');
  lines.push('## Fault log');
  lines.push(`  Enabled: ${config.error_reporting.enabled}`);
  lines.push(`  Level: ${config.error_reporting.level}`);
  lines.push(`  Rotate at: ${config.error_reporting.max_file_size_mb} MB`);

  return lines.join('\n');
}
