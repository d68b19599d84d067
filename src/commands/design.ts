/**
 * featwise design: write a fixed-effects design for explicit FEAT
 * directories, without discovery, prompts or an engine run.
 */

import path from 'path';
import { getConfig, getResolvedPaths } from '../lib/config.js';
import { ConsistencyError, ValidationError } from '../lib/errors.js';
import { describeResultDirectory } from '../lib/analysis/contrasts.js';
import { writeDesign } from '../lib/analysis/design.js';
import { fixedEffectsJob } from '../lib/analysis/fixed-effects.js';
import { reconcileContrastCounts } from '../lib/analysis/reconcile.js';
import { handleCommandError, validateThreshold } from './command-utils.js';

export interface DesignOptions {
  copes?: string;
  zThreshold?: string;
  clusterP?: string;
}

function parseCopeCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ValidationError(`--copes must be a positive integer, got "${value}"`);
  }
  return n;
}

function threshold(value: string | undefined, fallback: number, name: string): string {
  if (value === undefined) return String(fallback);
  const verdict = validateThreshold(value);
  if (verdict !== true) throw new ValidationError(`Invalid ${name}: ${verdict}`);
  return value.trim();
}

/** Cope count agreed by the inputs, or the explicit `--copes`. */
function resolveCopeCount(featDirs: string[], copes: string | undefined): number {
  if (copes !== undefined) return parseCopeCount(copes);

  const dirs = featDirs.map((d) => describeResultDirectory(d, '', '', 'lower'));
  const result = reconcileContrastCounts(dirs);
  if (result.status !== 'accepted' || result.excluded.length > 0) {
    throw new ConsistencyError(`${result.warnings.join(' ')} Pass --copes to set the count explicitly.`);
  }
  return result.commonCount;
}

/** Returns the path of the written design file. */
export function generateDesignFile(outputPath: string, featDirs: string[], options: DesignOptions = {}): string {
  if (featDirs.length === 0) {
    throw new ValidationError('At least one FEAT directory is required');
  }
  const config = getConfig();
  const paths = getResolvedPaths();
  const absDirs = featDirs.map((d) => path.resolve(d));
  const absOutput = path.resolve(outputPath);

  const job = fixedEffectsJob(absOutput, absDirs, resolveCopeCount(absDirs, options.copes), {
    templatePath: paths.fixed_effects_template,
    standardImage: paths.standard_image,
    zThreshold: threshold(options.zThreshold, config.thresholds.z, 'Z threshold'),
    clusterPThreshold: threshold(options.clusterP, config.thresholds.cluster_p, 'Cluster P threshold'),
  });
  writeDesign(job.templatePath, job.designPath, job.spec);
  return job.designPath;
}

export function design(outputPath: string, featDirs: string[], options: DesignOptions = {}): void {
  try {
    const designPath = generateDesignFile(outputPath, featDirs, options);
    console.log(`Generated FEAT fixed-effects design file at:\n- ${designPath}`);
  } catch (error) {
    handleCommandError(error, 'design');
  }
}
