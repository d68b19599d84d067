/**
 * Selection Engine
 *
 * Parses the include/exclude mini-language typed at the selection prompt:
 *
 *   [-]subject[:session[:run1,run2,...]]
 *
 * Tokens are whitespace separated; a leading `-` excludes. Inclusion tokens
 * are a sparse per-session override (untouched sessions keep all runs).
 */

import type { ResultDirectory, SelectionOutcome, SelectionRule } from './types.js';
import { compareNatural, normalizeRunNumber } from './naming.js';
import { SelectionError } from '../errors.js';

export const SELECTION_HELP = [
  "Specify selections as 'subject[:session[:runs]]' to include, or '-subject[:session[:runs]]' to exclude.",
  '',
  'For example:',
  "  To include: 'sub-01:ses-01:02,03'",
  "  To exclude: '-sub-03:ses-01 -sub-04'",
].join('\n');

/**
 * Parse and validate a selection string against the discovered subjects.
 * Validation is all-or-nothing: any bad token rejects the whole input.
 *
 * @throws SelectionError listing every invalid token
 */
export function parseSelection(input: string, knownSubjects: Iterable<string>): SelectionRule[] {
  const known = new Set(knownSubjects);
  const rules: SelectionRule[] = [];
  const invalid: string[] = [];

  for (const token of input.trim().split(/\s+/).filter(Boolean)) {
    const polarity = token.startsWith('-') ? 'exclude' : 'include';
    const body = polarity === 'exclude' ? token.slice(1) : token;
    const fields = body.split(':');
    const [subject = '', session = '', runsField = ''] = fields;

    if (fields.length > 3) {
      invalid.push(`${token} (Too many ':' separated fields)`);
      continue;
    }
    if (!subject) {
      invalid.push(`${token} (No subject given)`);
      continue;
    }
    if (!known.has(subject)) {
      invalid.push(`${token} (Subject not found)`);
      continue;
    }

    const rawRuns = runsField.split(',').filter((r) => r.trim() !== '');
    const runs: string[] = [];
    let badRun: string | undefined;
    for (const raw of rawRuns) {
      const run = normalizeRunNumber(raw);
      if (run === null) {
        badRun = raw;
        break;
      }
      runs.push(run);
    }
    if (badRun !== undefined) {
      invalid.push(`${token} (Invalid run '${badRun}')`);
      continue;
    }

    rules.push({
      polarity,
      subject,
      session: session || undefined,
      runs: runs.length > 0 ? runs : undefined,
      token,
    });
  }

  if (invalid.length > 0) {
    throw new SelectionError(invalid);
  }
  return rules;
}

export interface SelectableSession {
  subject: string;
  session: string;
  directories: ResultDirectory[];
}

function runMatches(dir: ResultDirectory, runs: Set<string>): boolean {
  if (dir.run === undefined) return false;
  const run = normalizeRunNumber(dir.run);
  return run !== null && runs.has(run);
}

/** Whole subject or whole subject-session excluded by a rule. */
function isExcluded(rules: SelectionRule[], subject: string, session: string): boolean {
  return rules.some(
    (r) =>
      r.polarity === 'exclude' &&
      r.subject === subject &&
      (r.session === undefined || (r.session === session && r.runs === undefined))
  );
}

/**
 * Apply parsed rules to the discovered sessions. Output is sorted by subject
 * then session (version-aware); directories inside a session by path.
 * With no rules every session comes back in full.
 */
export function applySelection(sessions: SelectableSession[], rules: SelectionRule[]): SelectionOutcome[] {
  const ordered = [...sessions].sort(
    (a, b) => compareNatural(a.subject, b.subject) || compareNatural(a.session, b.session)
  );

  return ordered.map(({ subject, session, directories }): SelectionOutcome => {
    if (isExcluded(rules, subject, session)) {
      return { subject, session, status: 'excluded' };
    }

    const matching = rules.filter((r) => r.subject === subject && r.session === session);

    let selected = directories;
    const inclusions = matching.filter((r) => r.polarity === 'include');
    if (inclusions.length > 0 && inclusions.every((r) => r.runs !== undefined)) {
      const keep = new Set(inclusions.flatMap((r) => r.runs ?? []));
      selected = selected.filter((dir) => runMatches(dir, keep));
    }

    const drop = new Set(matching.filter((r) => r.polarity === 'exclude').flatMap((r) => r.runs ?? []));
    if (drop.size > 0) {
      selected = selected.filter((dir) => !runMatches(dir, drop));
    }

    return {
      subject,
      session,
      status: 'selected',
      directories: [...selected].sort((a, b) => compareNatural(a.path, b.path)),
    };
  });
}
