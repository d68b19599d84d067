/**
 * Fixed-effects (second-level) planning.
 *
 * Turns reconciled subject-sessions plus the user's selection into one design
 * job per subject-session that still needs running.
 */

import fs from 'fs';
import path from 'path';
import type { ResultDirectory, SelectionRule, SubjectSessionGroup } from './types.js';
import type { DesignJob } from './session.js';
import { applySelection, type SelectableSession } from './selection.js';
import { compareNatural } from './naming.js';

export const FIXED_EFFECTS_DESIGN_NAME = 'modified_fixed-effects_design.fsf';

/** `<sub>_<ses>[_task-<task>]_desc-fixed-effects` */
export function fixedEffectsOutputName(subject: string, session: string, task?: string): string {
  return task ? `${subject}_${session}_task-${task}_desc-fixed-effects` : `${subject}_${session}_desc-fixed-effects`;
}

export function fixedEffectsDesignPath(outputPath: string): string {
  return path.join(outputPath, FIXED_EFFECTS_DESIGN_NAME);
}

export interface FixedEffectsSettings {
  /** `<level-2>/<analysis>` */
  level2AnalysisDir: string;
  templatePath: string;
  standardImage: string;
  zThreshold: string;
  clusterPThreshold: string;
  minRuns: number;
  task?: string;
  /** Defaults to a directory check; injectable for tests */
  outputExists?: (gfeatPath: string) => boolean;
}

interface PlanBase {
  subject: string;
  session: string;
}

export type FixedEffectsPlanItem =
  | (PlanBase & { status: 'rejected'; warnings: string[] })
  | (PlanBase & { status: 'excluded' })
  | (PlanBase & { status: 'too-few-runs'; directories: ResultDirectory[] })
  | (PlanBase & { status: 'exists'; directories: ResultDirectory[]; engineOutput: string })
  | (PlanBase & { status: 'ready'; directories: ResultDirectory[]; job: DesignJob });

/**
 * Build a job for a single subject-session. Exposed for `featwise design`,
 * which skips discovery and selection.
 */
export function fixedEffectsJob(
  outputPath: string,
  inputs: string[],
  copeCount: number,
  settings: Pick<FixedEffectsSettings, 'templatePath' | 'standardImage' | 'zThreshold' | 'clusterPThreshold'>,
  label: string = path.basename(outputPath)
): DesignJob {
  return {
    label,
    templatePath: settings.templatePath,
    designPath: fixedEffectsDesignPath(outputPath),
    // The design lives in its own directory next to the engine's `.gfeat`
    cleanupPath: outputPath,
    engineOutput: `${outputPath}.gfeat`,
    spec: {
      outputDir: outputPath,
      standardImage: settings.standardImage,
      zThreshold: settings.zThreshold,
      clusterPThreshold: settings.clusterPThreshold,
      inputs,
      copeCount,
    },
  };
}

function defaultOutputExists(gfeatPath: string): boolean {
  return fs.existsSync(gfeatPath) && fs.statSync(gfeatPath).isDirectory();
}

/**
 * Plan every subject-session in subject/session order.
 *
 * Only groups with an accepted reconciliation take part in selection; their
 * valid runs are what the selection filters.
 */
export function planFixedEffects(
  groups: SubjectSessionGroup[],
  rules: SelectionRule[],
  settings: FixedEffectsSettings
): FixedEffectsPlanItem[] {
  const outputExists = settings.outputExists ?? defaultOutputExists;
  const commonCounts = new Map<string, number>();
  const selectable: SelectableSession[] = [];
  const items: FixedEffectsPlanItem[] = [];

  for (const group of groups) {
    const { reconciliation: r } = group;
    if (r.status === 'accepted') {
      commonCounts.set(`${group.subject}:${group.session}`, r.commonCount);
      selectable.push({ subject: group.subject, session: group.session, directories: r.valid });
    } else {
      items.push({ subject: group.subject, session: group.session, status: 'rejected', warnings: r.warnings });
    }
  }

  for (const outcome of applySelection(selectable, rules)) {
    const { subject, session } = outcome;
    if (outcome.status === 'excluded') {
      items.push({ subject, session, status: 'excluded' });
      continue;
    }

    const { directories } = outcome;
    if (directories.length < settings.minRuns) {
      items.push({ subject, session, status: 'too-few-runs', directories });
      continue;
    }

    const outputPath = path.join(
      settings.level2AnalysisDir,
      subject,
      session,
      fixedEffectsOutputName(subject, session, settings.task)
    );
    const engineOutput = `${outputPath}.gfeat`;
    if (outputExists(engineOutput)) {
      items.push({ subject, session, status: 'exists', directories, engineOutput });
      continue;
    }

    const copeCount = commonCounts.get(`${subject}:${session}`) ?? 0;
    const job = fixedEffectsJob(
      outputPath,
      directories.map((d) => d.path),
      copeCount,
      settings,
      `${subject} ${session}`
    );
    items.push({ subject, session, status: 'ready', directories, job });
  }

  return items.sort((a, b) => compareNatural(a.subject, b.subject) || compareNatural(a.session, b.session));
}

export function readyJobs(items: FixedEffectsPlanItem[]): DesignJob[] {
  return items.flatMap((item) => (item.status === 'ready' ? [item.job] : []));
}
