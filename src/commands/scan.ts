/**
 * featwise scan: report level-1 analyses and how each subject-session
 * reconciles, without prompting or writing anything but the run log.
 */

import path from 'path';
import { getConfig, getDatasetRoot, getResolvedPaths } from '../lib/config.js';
import { NotFoundError, ValidationError } from '../lib/errors.js';
import { createRunLog, type RunLog } from '../lib/run-log.js';
import { discoverAnalysis, discoverSubjects } from '../lib/analysis/discovery.js';
import { reconcileSessions, validDirectories } from '../lib/analysis/reconcile.js';
import { displayPath, renderReconciliation } from '../lib/analysis/render.js';
import { findAnalysisDirs } from '../lib/analysis/scanner.js';
import { handleCommandError } from './command-utils.js';

export interface ScanOptions {
  analysis?: string;
}

export interface ScanSummary {
  analysis: string;
  subjects: number;
  sessions: number;
  accepted: number;
  rejected: number;
  empty: number;
  /** Runs kept across the accepted subject-sessions */
  usableRuns: number;
}

export function scanAnalysis(analysisDir: string, log: RunLog, base: string): ScanSummary {
  const naming = getConfig().naming;
  const sessions = discoverAnalysis(analysisDir, 'lower', naming);
  const groups = reconcileSessions(sessions);
  const accepted = groups.filter((g) => g.reconciliation.status === 'accepted').length;

  log.section(displayPath(analysisDir, base));
  if (sessions.length === 0) {
    log.print('No subject-sessions found.');
  } else {
    log.print(renderReconciliation(sessions, groups, analysisDir).join('\n'));
  }

  return {
    analysis: path.basename(analysisDir),
    subjects: discoverSubjects(analysisDir, naming).length,
    sessions: sessions.length,
    accepted,
    rejected: groups.length - accepted,
    empty: sessions.length - groups.length,
    usableRuns: groups.reduce((n, g) => n + validDirectories(g).length, 0),
  };
}

async function runScan(options: ScanOptions, log: RunLog): Promise<void> {
  const paths = getResolvedPaths();
  const root = getDatasetRoot();

  let analyses = findAnalysisDirs(paths.level1_dir, 'lower');
  if (analyses.length === 0) {
    throw new NotFoundError(`No analysis directories found in ${paths.level1_dir}.`);
  }
  if (options.analysis !== undefined) {
    analyses = analyses.filter((d) => path.basename(d) === options.analysis);
    if (analyses.length === 0) {
      throw new ValidationError(`No level-1 analysis named ${options.analysis}`);
    }
  }

  const summaries = analyses.map((dir) => scanAnalysis(dir, log, root));

  log.section('Summary');
  for (const s of summaries) {
    log.print(
      `  ${s.analysis}: ${s.subjects} subjects; ${s.accepted} usable (${s.usableRuns} runs), ` +
        `${s.rejected} rejected, ${s.empty} without runs (of ${s.sessions} sessions)`
    );
  }
}

export async function scan(options: ScanOptions = {}): Promise<void> {
  const log = createRunLog('scan');
  try {
    await runScan(options, log);
  } catch (error) {
    handleCommandError(error, 'scan', log);
  }
}
