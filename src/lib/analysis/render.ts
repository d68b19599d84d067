/**
 * Text rendering for the interactive commands. Every function returns lines
 * so callers decide where they go (console, run log, tests).
 */

import path from 'path';
import type { ContrastPlan, GroupSelection, ResultDirectory, SubjectSessionGroup } from './types.js';
import type { SessionCandidates } from './discovery.js';
import type { FixedEffectsPlanItem } from './fixed-effects.js';
import type { MixedEffectsPlanItem } from './mixed-effects.js';

const RULE = '----------------------------------------';

/** Path shown relative to `base` when it lies underneath, otherwise as-is. */
export function displayPath(p: string, base?: string): string {
  if (!base) return p;
  const rel = path.relative(base, p);
  return rel && !rel.startsWith('..') && !path.isAbsolute(rel) ? rel : p;
}

function warningLines(warnings: string[]): string[] {
  return warnings.map((w) => `  [Warning] ${w}`);
}

// ============================================================================
// Reconciliation listing
// ============================================================================

function renderGroup(group: SubjectSessionGroup, base?: string): string[] {
  const r = group.reconciliation;
  const key = `${group.subject}:${group.session}`;

  if (r.status === 'tie') {
    return ['Warnings:', ...warningLines(r.warnings), '', `Excluding subject-session ${key} due to tie in cope counts.`];
  }
  if (r.status === 'no-majority') {
    return [
      'Warnings:',
      ...warningLines(r.warnings),
      '',
      `Excluding subject-session ${key} due to insufficient runs with the same cope count.`,
    ];
  }

  const lines = ['Valid Feat Directories:', ...r.valid.map((d) => `  • ${displayPath(d.path, base)}`)];
  if (r.warnings.length > 0) {
    lines.push('', 'Warnings:', ...warningLines(r.warnings));
  }
  return lines;
}

/** Per subject-session listing of what reconciliation kept, excluded or rejected. */
export function renderReconciliation(
  sessions: SessionCandidates[],
  groups: SubjectSessionGroup[],
  base?: string
): string[] {
  const byKey = new Map(groups.map((g) => [`${g.subject}:${g.session}`, g]));
  const lines: string[] = [];

  for (const s of sessions) {
    lines.push(`--- Subject: ${s.subject} | Session: ${s.session} ---`, '');
    const group = byKey.get(`${s.subject}:${s.session}`);
    lines.push(...(group ? renderGroup(group, base) : ['No feat directories found.']), '');
  }
  return lines;
}

// ============================================================================
// Fixed effects
// ============================================================================

function renderDirectories(heading: string, directories: ResultDirectory[], base?: string): string[] {
  return [heading, ...directories.map((d) => `  • ${displayPath(d.path, base)}`)];
}

export function renderFixedEffectsPlan(items: FixedEffectsPlanItem[], minRuns: number, base?: string): string[] {
  const lines: string[] = [];

  for (const item of items) {
    lines.push('', `Subject: ${item.subject} | Session: ${item.session}`, RULE);

    switch (item.status) {
      case 'rejected':
        lines.push('  - Excluded: cope counts could not be reconciled.');
        break;
      case 'excluded':
        lines.push('  - Excluded based on your selections.');
        break;
      case 'too-few-runs':
        lines.push(
          item.directories.length === 0
            ? '  - No matching directories found.'
            : `  - Not enough runs for fixed effects analysis (minimum ${minRuns} runs required). Skipping.`
        );
        break;
      case 'exists':
        lines.push(
          ...renderDirectories('Selected Feat Directories:', item.directories, base),
          '',
          'Output Directory:',
          `- ${item.engineOutput}`,
          '',
          '[Notice] Output directory already exists. Skipping fixed effects analysis for this subject-session.'
        );
        break;
      case 'ready':
        lines.push(
          ...renderDirectories('Selected Feat Directories:', item.directories, base),
          '',
          'Output Directory:',
          `- ${item.job.engineOutput}`
        );
        break;
    }
  }
  return lines;
}

// ============================================================================
// Mixed effects
// ============================================================================

export const MODIFY_OPTIONS = [
  'Options:',
  '  • To exclude a single subject, type -subject (e.g., -sub-01). Only one subject can be excluded at a time.',
  '  • To add or replace directories, type add.',
  '  • Press Enter/Return to confirm and proceed with third-level mixed effects analysis if the selections are final.',
];

function directoryHeading(dir: ResultDirectory): string {
  return dir.level === 'lower' ? 'Selected Feat Directory:' : 'Higher-level Feat Directory:';
}

/** The whole selection, re-rendered on every pass of the modify loop. */
export function renderGroupSelection(selection: GroupSelection, session: string, base?: string): string[] {
  const lines = ['=== Confirm Your Selections for Mixed Effects Analysis ===', `Session: ${session}`, ''];

  for (const entry of selection.entries) {
    lines.push(`Subject: ${entry.subject} | Session: ${entry.session}`, RULE);
    for (const dir of entry.directories) {
      lines.push(directoryHeading(dir), `  - ${displayPath(dir.path, base)}`);
    }
    lines.push('');
  }

  if (selection.entries.length === 0) {
    lines.push('(no subjects selected)', '');
  }
  lines.push('============================================');
  return lines;
}

/** Cope image of every input, grouped by contrast. */
export function renderContrastPlans(plans: ContrastPlan[]): string[] {
  const lines: string[] = [];
  for (const plan of plans) {
    lines.push(`=== Cope image: cope${plan.contrast} ===`);
    for (const input of plan.inputs) {
      lines.push('', `--- Subject: ${input.subject} | Session: ${input.session} ---`, 'Cope file:', `  - ${input.file}`);
    }
    lines.push('');
  }
  return lines;
}

export function renderMixedEffectsPlan(items: MixedEffectsPlanItem[]): string[] {
  return items.flatMap((item) =>
    item.status === 'exists'
      ? [`cope${item.contrast}: output already exists at ${item.engineOutput}. Skipping.`]
      : [`cope${item.contrast}: ${item.job.designPath} -> ${item.job.engineOutput}`]
  );
}
