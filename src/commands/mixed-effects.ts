/**
 * featwise mixed-effects: third-level FLAME 1 group analysis, one FEAT run per
 * cope shared by every selected input.
 */

import fs from 'fs';
import path from 'path';
import { input, select } from '@inquirer/prompts';
import { getConfig, getDatasetRoot, getResolvedPaths, type FeatwiseConfig } from '../lib/config.js';
import { NotFoundError, ValidationError } from '../lib/errors.js';
import { createRunLog, type RunLog } from '../lib/run-log.js';
import { assertDesignInputs } from '../lib/analysis/design.js';
import { discoverAnalysis, listSessionResults } from '../lib/analysis/discovery.js';
import {
  addOrReplace,
  assertMinimumInputs,
  createGroupSelection,
  excludeSubject,
  parseModifyCommand,
  selectedDirectories,
} from '../lib/analysis/group-selection.js';
import { intersectContrasts, planContrasts } from '../lib/analysis/intersect.js';
import { groupOutputDirName, planMixedEffects } from '../lib/analysis/mixed-effects.js';
import {
  MODIFY_OPTIONS,
  displayPath,
  renderContrastPlans,
  renderGroupSelection,
  renderMixedEffectsPlan,
} from '../lib/analysis/render.js';
import { findAnalysisDirs, findSessionNames, findSubjectDirs } from '../lib/analysis/scanner.js';
import { runDesignSession } from '../lib/analysis/session.js';
import type { AnalysisLevel, GroupEntry, GroupSelection } from '../lib/analysis/types.js';
import {
  chooseDirectory,
  chooseName,
  handleCommandError,
  isInteractive,
  parseFailurePolicy,
  promptLabel,
  promptThresholds,
  reportOutcome,
  runConfirmation,
} from './command-utils.js';

export interface MixedEffectsOptions {
  analysis?: string;
  session?: string;
  exclude?: string[];
  task?: string;
  desc?: string;
  zThreshold?: string;
  clusterP?: string;
  yes?: boolean;
  onEngineFailure?: string;
}

type ResolvedPaths = ReturnType<typeof getResolvedPaths>;

// ============================================================================
// Add / replace dialog
// ============================================================================

/**
 * Walk the user through picking one result directory (lower- or higher-level)
 * for a subject. Returns null when the dialog is cancelled or finds nothing.
 */
async function addDialog(config: FeatwiseConfig, paths: ResolvedPaths, root: string, log: RunLog): Promise<GroupEntry | null> {
  const level = await select<AnalysisLevel | 'cancel'>({
    message: 'Select input options',
    choices: [
      { name: 'Inputs are lower-level FEAT directories', value: 'lower' },
      { name: 'Inputs are higher-level .gfeat directories', value: 'higher' },
      { name: 'Cancel', value: 'cancel' },
    ],
  });
  if (level === 'cancel') return null;

  const base = level === 'lower' ? paths.level1_dir : paths.level2_dir;
  const analyses = findAnalysisDirs(base, level);
  if (analyses.length === 0) {
    log.print('No analysis directories found.');
    return null;
  }
  const analysisDir = await select({
    message: 'Select analysis directory',
    choices: analyses.map((d) => ({ name: displayPath(d, root), value: d })),
  });
  log.record(`Add: analysis ${analysisDir}`);

  const sessions = findSessionNames(analysisDir, config.naming.subject_patterns, config.naming.session_patterns);
  if (sessions.length === 0) {
    log.print(`No sessions found in ${analysisDir}.`);
    return null;
  }
  const session = await select({ message: 'Select session', choices: sessions.map((s) => ({ name: s, value: s })) });

  const subjectDirs = findSubjectDirs(analysisDir, config.naming.subject_patterns).filter((d) =>
    fs.existsSync(path.join(d, session))
  );
  if (subjectDirs.length === 0) {
    log.print(`No subjects found in session ${session}.`);
    return null;
  }
  const subjectDir = await select({
    message: 'Select subject to add/replace',
    choices: subjectDirs.map((d) => ({ name: path.basename(d), value: d })),
  });
  const subject = path.basename(subjectDir);

  const results = listSessionResults(path.join(subjectDir, session), subject, session, level);
  if (results.length === 0) {
    const kind = level === 'lower' ? 'feat' : '.gfeat';
    log.print(`  - No ${kind} directories found for ${subject} in session ${session}.`);
    return null;
  }
  const directory = await select({
    message:
      level === 'lower'
        ? 'Select the run corresponding to the lower-level FEAT directory to add/replace'
        : 'Select the .gfeat directory to add/replace',
    choices: results.map((r) => ({ name: displayPath(r.path, root), value: r })),
  });
  log.record(`Add: ${subject} ${session} ${directory.path}`);
  return { subject, session, directories: [directory] };
}

// ============================================================================
// Modify loop
// ============================================================================

async function modifyLoop(
  initial: GroupSelection,
  session: string,
  config: FeatwiseConfig,
  paths: ResolvedPaths,
  root: string,
  log: RunLog
): Promise<GroupSelection> {
  let selection = initial;

  for (;;) {
    log.print('\n' + renderGroupSelection(selection, session, root).join('\n'));
    log.print('\n' + MODIFY_OPTIONS.join('\n') + '\n');

    const line = await input({ message: '>' });
    log.record(`> ${line}`);
    const command = parseModifyCommand(line);

    switch (command.kind) {
      case 'confirm':
        return selection;
      case 'invalid':
        log.warn(`\nError: ${command.message}`);
        break;
      case 'exclude':
        try {
          selection = excludeSubject(selection, command.subject);
        } catch (error) {
          if (!(error instanceof ValidationError)) throw error;
          log.warn(`\nError: ${error.message}`);
        }
        break;
      case 'add': {
        const entry = await addDialog(config, paths, root, log);
        if (entry) selection = addOrReplace(selection, entry);
        break;
      }
    }
  }
}

// ============================================================================
// Command
// ============================================================================

async function runMixedEffects(options: MixedEffectsOptions, log: RunLog): Promise<void> {
  const config = getConfig();
  const paths = getResolvedPaths();
  const root = getDatasetRoot();
  const onFailure = parseFailurePolicy(options.onEngineFailure, config.engine.mixed_effects_on_failure);

  assertDesignInputs(paths.mixed_effects_template, paths.standard_image);

  const analyses = findAnalysisDirs(paths.level2_dir, 'higher');
  if (analyses.length === 0) {
    throw new NotFoundError(
      'No available directories for higher-level analysis found. ' +
        'Please ensure that second-level fixed-effects analysis has been completed.',
      { level2_dir: paths.level2_dir }
    );
  }

  log.section('Higher level FEAT directories');
  const analysisDir = await chooseDirectory(analyses, options.analysis, 'Select analysis directory containing 3D cope images', root);
  log.print(`You have selected the following analysis directory:\n${analysisDir}`);

  const sessions = findSessionNames(analysisDir, config.naming.subject_patterns, config.naming.session_patterns);
  if (sessions.length === 0) {
    throw new NotFoundError(`No sessions found in ${analysisDir}.`);
  }
  const session = await chooseName(sessions, options.session, 'Select session');
  log.print(`You have selected session: ${session}`);

  const found = discoverAnalysis(analysisDir, 'higher', config.naming, session).filter((s) => s.directories.length > 0);
  if (found.length === 0) {
    throw new NotFoundError(`No subject directories found in session ${session}.`);
  }

  let selection = createGroupSelection(found);
  for (const subject of options.exclude ?? []) {
    selection = excludeSubject(selection, subject);
  }

  if (isInteractive()) {
    selection = await modifyLoop(selection, session, config, paths, root, log);
  } else {
    log.print('\n' + renderGroupSelection(selection, session, root).join('\n'));
  }

  assertMinimumInputs(selection, config.limits.min_inputs);
  const contrasts = intersectContrasts(selectedDirectories(selection));
  const plans = planContrasts(selection.entries, contrasts);

  log.section('Final Selected Directories');
  log.print(renderContrastPlans(plans).join('\n'));

  const thresholds = await promptThresholds(options, config.thresholds, 'mixed effects analysis flame 1', log);
  const task = await promptLabel(options.task, 'Task name for the group output folder (optional):');
  const desc = await promptLabel(options.desc, 'Descriptor for the group output folder (optional):');

  const outputDir = path.join(paths.level3_dir, groupOutputDirName(task, desc));
  log.print(`\nOutput directory will be set to: ${outputDir}`);

  const items = planMixedEffects(plans, {
    outputDir,
    templatePath: paths.mixed_effects_template,
    standardImage: paths.standard_image,
    ...thresholds,
  });
  log.print(renderMixedEffectsPlan(items).join('\n'));

  const jobs = items.flatMap((item) => (item.status === 'ready' ? [item.job] : []));
  if (jobs.length === 0) {
    log.print('\n=== No new analyses to run. All cope outputs already exist. ===\n');
    return;
  }

  log.section('Running Mixed Effects');
  const outcome = await runDesignSession(jobs, {
    engineCommand: config.engine.command,
    onFailure,
    log,
    confirm: runConfirmation(options.yes, `Proceed with ${jobs.length} third-level mixed effects analyses?`),
  });
  reportOutcome(outcome, log);
}

export async function mixedEffects(options: MixedEffectsOptions = {}): Promise<void> {
  const log = createRunLog('mixed-effects');
  log.print('=== Third Level Analysis: Mixed Effects Flame 1 ===');
  try {
    await runMixedEffects(options, log);
  } catch (error) {
    handleCommandError(error, 'mixed-effects', log);
  }
}
