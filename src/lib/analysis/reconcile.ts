/**
 * Contrast-Count Reconciler
 *
 * Runs of one subject-session can only be combined when they carry the same
 * number of copes. Partial upstream failures leave odd runs behind, so the
 * group keeps the runs that agree with a strict majority and drops the rest.
 */

import path from 'path';
import type { ExcludedDirectory, ReconcileResult, ResultDirectory, SubjectSessionGroup } from './types.js';
import type { SessionCandidates } from './discovery.js';

export function excludedRunWarning(dir: ResultDirectory, commonCount: number): string {
  return `${path.basename(dir.path)} does not have the common cope count ${commonCount} and will be excluded.`;
}

export function missingStatsWarning(dir: ResultDirectory): string {
  return `${path.basename(dir.path)} (Stats directory not found)`;
}

export function unequalCountsWarning(counts: number[], excludingGroup: boolean): string {
  const base = `Unequal cope counts found across runs (${counts.join(' ')}).`;
  return excludingGroup ? `${base} Excluding this subject-session.` : base;
}

/**
 * Reconcile the cope counts of one subject-session's directories.
 *
 * - Several counts sharing the highest frequency → `tie`, whole group out.
 * - The most frequent count wins only when it appears in strictly more than
 *   half of the directories; the others are excluded with a warning.
 * - Otherwise → `no-majority`, whole group out.
 */
export function reconcileContrastCounts(candidates: ResultDirectory[]): ReconcileResult {
  if (candidates.length === 0) {
    return { status: 'no-majority', counts: [], warnings: ['No result directories to reconcile.'] };
  }

  const missing = candidates.filter((dir) => dir.missingStats).map(missingStatsWarning);

  // Map keeps first-seen order for the warning text
  const frequency = new Map<number, number>();
  for (const dir of candidates) {
    const count = dir.contrasts.length;
    frequency.set(count, (frequency.get(count) ?? 0) + 1);
  }
  const counts = [...frequency.keys()];

  let maxFreq = 0;
  let leaders: number[] = [];
  for (const [count, freq] of frequency) {
    if (freq > maxFreq) {
      maxFreq = freq;
      leaders = [count];
    } else if (freq === maxFreq) {
      leaders.push(count);
    }
  }

  if (leaders.length > 1) {
    return { status: 'tie', counts, warnings: [...missing, unequalCountsWarning(counts, false)] };
  }

  const commonCount = leaders[0];
  if (maxFreq * 2 <= candidates.length) {
    return { status: 'no-majority', counts, warnings: [...missing, unequalCountsWarning(counts, true)] };
  }

  const valid: ResultDirectory[] = [];
  const excluded: ExcludedDirectory[] = [];
  for (const dir of candidates) {
    if (dir.contrasts.length === commonCount) {
      valid.push(dir);
    } else {
      excluded.push({ directory: dir, reason: excludedRunWarning(dir, commonCount) });
    }
  }

  return {
    status: 'accepted',
    commonCount,
    valid,
    excluded,
    warnings: [...missing, ...excluded.map((e) => e.reason)],
  };
}

/** Reconcile every subject-session that has result directories. */
export function reconcileSessions(sessions: SessionCandidates[]): SubjectSessionGroup[] {
  return sessions
    .filter((s) => s.directories.length > 0)
    .map((s) => ({
      subject: s.subject,
      session: s.session,
      candidates: s.directories,
      reconciliation: reconcileContrastCounts(s.directories),
    }));
}

/** Directories that survived reconciliation, or an empty list for rejected groups. */
export function validDirectories(group: SubjectSessionGroup): ResultDirectory[] {
  return group.reconciliation.status === 'accepted' ? group.reconciliation.valid : [];
}
