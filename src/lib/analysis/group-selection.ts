/**
 * Group selection for mixed-effects analysis.
 *
 * The modify loop never mutates: every command produces a new GroupSelection,
 * so each transition can be tested on its own and the display step simply
 * re-renders whatever value it is given.
 */

import type { GroupEntry, GroupSelection, ResultDirectory } from './types.js';
import { compareNatural } from './naming.js';
import { ValidationError } from '../errors.js';

// ============================================================================
// Commands
// ============================================================================

export type ModifyCommand =
  | { kind: 'confirm' }
  | { kind: 'exclude'; subject: string }
  | { kind: 'add' }
  | { kind: 'invalid'; message: string };

/**
 * Parse one line of the modify prompt: empty confirms, `-<subject>` drops a
 * subject, `add` starts the add/replace dialog.
 */
export function parseModifyCommand(input: string): ModifyCommand {
  const line = input.trim();
  if (line === '') return { kind: 'confirm' };

  if (line.startsWith('-')) {
    const subject = line.slice(1).trim();
    if (/\s/.test(subject)) {
      return { kind: 'invalid', message: 'Only one subject can be removed at a time. Please try again.' };
    }
    if (subject === '') {
      return { kind: 'invalid', message: 'No valid subject provided. Please try again.' };
    }
    return { kind: 'exclude', subject };
  }

  if (line.toLowerCase() === 'add') return { kind: 'add' };
  return { kind: 'invalid', message: 'Invalid input. Please try again.' };
}

// ============================================================================
// Transitions
// ============================================================================

function sortEntries(entries: readonly GroupEntry[]): GroupEntry[] {
  return [...entries]
    .map((entry) => ({
      ...entry,
      directories: [...entry.directories].sort((a, b) => compareNatural(a.path, b.path)),
    }))
    .sort((a, b) => compareNatural(a.subject, b.subject));
}

export function createGroupSelection(entries: readonly GroupEntry[]): GroupSelection {
  return { entries: sortEntries(entries.filter((e) => e.directories.length > 0)) };
}

export function hasSubject(selection: GroupSelection, subject: string): boolean {
  return selection.entries.some((e) => e.subject === subject);
}

/**
 * @throws ValidationError when the subject is not (or no longer) selected
 */
export function excludeSubject(selection: GroupSelection, subject: string): GroupSelection {
  if (!hasSubject(selection, subject)) {
    throw new ValidationError(
      `Subject ${subject} is either not in the dataset or has already been excluded. Please check your input and try again.`,
      { subject }
    );
  }
  return { entries: selection.entries.filter((e) => e.subject !== subject) };
}

/** Replace the subject's entry (directories and session) or add it when absent. */
export function addOrReplace(selection: GroupSelection, entry: GroupEntry): GroupSelection {
  if (entry.directories.length === 0) {
    throw new ValidationError(`No directory given for ${entry.subject}`, { subject: entry.subject });
  }
  const others = selection.entries.filter((e) => e.subject !== entry.subject);
  return { entries: sortEntries([...others, entry]) };
}

// ============================================================================
// Queries
// ============================================================================

export function selectedDirectories(selection: GroupSelection): ResultDirectory[] {
  return selection.entries.flatMap((e) => e.directories);
}

export function countInputs(selection: GroupSelection): number {
  return selectedDirectories(selection).length;
}

/**
 * @throws ValidationError below `minimum` directories
 */
export function assertMinimumInputs(selection: GroupSelection, minimum: number): void {
  const total = countInputs(selection);
  if (total < minimum) {
    throw new ValidationError(
      `At least ${minimum} directories are required for mixed effects analysis. You have selected only ${total} directories.`,
      { total, minimum }
    );
  }
}
