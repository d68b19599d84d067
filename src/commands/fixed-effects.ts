/**
 * featwise fixed-effects: second-level analysis across the runs of each
 * subject-session.
 */

import path from 'path';
import { getConfig, getDatasetRoot, getResolvedPaths } from '../lib/config.js';
import { NotFoundError } from '../lib/errors.js';
import { createRunLog, type RunLog } from '../lib/run-log.js';
import { assertDesignInputs } from '../lib/analysis/design.js';
import { discoverAnalysis } from '../lib/analysis/discovery.js';
import { planFixedEffects, readyJobs } from '../lib/analysis/fixed-effects.js';
import { reconcileSessions } from '../lib/analysis/reconcile.js';
import { renderFixedEffectsPlan, renderReconciliation } from '../lib/analysis/render.js';
import { findAnalysisDirs } from '../lib/analysis/scanner.js';
import { runDesignSession } from '../lib/analysis/session.js';
import {
  chooseDirectory,
  handleCommandError,
  parseFailurePolicy,
  promptLabel,
  promptSelection,
  promptThresholds,
  reportOutcome,
  runConfirmation,
} from './command-utils.js';

export interface FixedEffectsOptions {
  analysis?: string;
  select?: string;
  task?: string;
  zThreshold?: string;
  clusterP?: string;
  yes?: boolean;
  onEngineFailure?: string;
}

async function runFixedEffects(options: FixedEffectsOptions, log: RunLog): Promise<void> {
  const config = getConfig();
  const paths = getResolvedPaths();
  const root = getDatasetRoot();
  const onFailure = parseFailurePolicy(options.onEngineFailure, config.engine.fixed_effects_on_failure);

  assertDesignInputs(paths.fixed_effects_template, paths.standard_image);

  const analyses = findAnalysisDirs(paths.level1_dir, 'lower', { nameContains: 'analysis' });
  if (analyses.length === 0) {
    throw new NotFoundError(`No analysis directories found in ${paths.level1_dir}.`);
  }

  log.section('First-Level Analysis Directory Selection');
  const analysisDir = await chooseDirectory(
    analyses,
    options.analysis,
    'Select a first-level analysis directory for second-level fixed effects',
    root
  );
  log.print(`You have selected the following analysis directory for fixed effects:\n${analysisDir}`);

  const sessions = discoverAnalysis(analysisDir, 'lower', config.naming);
  if (sessions.length === 0) {
    throw new NotFoundError(`No subject directories found in ${analysisDir}.`);
  }
  const groups = reconcileSessions(sessions);

  log.section('Listing First-Level Feat Directories');
  log.print('The following feat directories will be used as inputs for the second-level fixed effects analysis:\n');
  log.print(renderReconciliation(sessions, groups, analysisDir).join('\n'));

  log.section('Subject, Session, and Run Selection');
  const subjects = [...new Set(sessions.map((s) => s.subject))];
  const rules = await promptSelection(subjects, options.select, log);

  const task = await promptLabel(options.task, 'Task name for the output filenames (optional):');
  const thresholds = await promptThresholds(options, config.thresholds, 'fixed effects analysis', log);

  const items = planFixedEffects(groups, rules, {
    level2AnalysisDir: path.join(paths.level2_dir, path.basename(analysisDir)),
    templatePath: paths.fixed_effects_template,
    standardImage: paths.standard_image,
    minRuns: config.limits.min_runs,
    task,
    ...thresholds,
  });

  log.section('Confirm Your Selections for Fixed Effects Analysis');
  log.print(renderFixedEffectsPlan(items, config.limits.min_runs, analysisDir).join('\n'));

  const jobs = readyJobs(items);
  if (jobs.length === 0) {
    log.print('\n=== No new analyses to run. All specified outputs already exist or were excluded. ===\n');
    return;
  }

  log.section('Running Fixed Effects');
  const outcome = await runDesignSession(jobs, {
    engineCommand: config.engine.command,
    onFailure,
    log,
    confirm: runConfirmation(options.yes, `Proceed with ${jobs.length} second-level fixed effects analyses?`),
  });
  reportOutcome(outcome, log);
}

export async function fixedEffects(options: FixedEffectsOptions = {}): Promise<void> {
  const log = createRunLog('fixed-effects');
  log.print('=== Second Level Analysis: Fixed Effects ===');
  try {
    await runFixedEffects(options, log);
  } catch (error) {
    handleCommandError(error, 'fixed-effects', log);
  }
}
