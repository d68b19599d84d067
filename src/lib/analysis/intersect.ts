/**
 * Cross-Directory Contrast Intersector
 *
 * A group analysis can only run copes that every input carries. Inputs may
 * mix lower-level `.feat` and higher-level `.gfeat` directories.
 */

import fs from 'fs';
import type { ContrastPlan, GroupEntry, ResultDirectory } from './types.js';
import { compareNatural } from './naming.js';
import { contrastFilePath } from './contrasts.js';
import { ConsistencyError, IntersectionError } from '../errors.js';

/**
 * Cope indices present in every directory, ascending.
 *
 * @throws IntersectionError when nothing is shared (or nothing was given)
 */
export function intersectContrasts(directories: ResultDirectory[]): number[] {
  if (directories.length === 0) {
    throw new IntersectionError('No directories selected; nothing to intersect.');
  }

  let common = new Set(directories[0].contrasts);
  for (const dir of directories.slice(1)) {
    const own = new Set(dir.contrasts);
    common = new Set([...common].filter((c) => own.has(c)));
  }

  if (common.size === 0) {
    throw new IntersectionError('No common copes found across all selected directories.', {
      directories: directories.map((d) => d.path),
    });
  }
  return [...common].sort((a, b) => a - b);
}

export interface OrderedInput {
  subject: string;
  session: string;
  directory: ResultDirectory;
}

/** Inputs in engine order: subjects version-sorted, then directories by path. */
export function orderInputs(entries: readonly GroupEntry[]): OrderedInput[] {
  return [...entries]
    .sort((a, b) => compareNatural(a.subject, b.subject))
    .flatMap((entry) =>
      [...entry.directories]
        .sort((a, b) => compareNatural(a.path, b.path))
        .map((directory) => ({ subject: entry.subject, session: entry.session, directory }))
    );
}

function fileExists(p: string): boolean {
  try {
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolve the cope image of every input for every shared contrast.
 *
 * @throws ConsistencyError when an expected cope image is missing; the
 *   intersection said it exists, so the tree changed underneath us
 */
export function planContrasts(
  entries: readonly GroupEntry[],
  contrasts: number[],
  exists: (p: string) => boolean = fileExists
): ContrastPlan[] {
  const inputs = orderInputs(entries);

  return contrasts.map((contrast) => ({
    contrast,
    inputs: inputs.map(({ subject, session, directory }) => {
      const file = contrastFilePath(directory, contrast);
      if (!exists(file)) {
        throw new ConsistencyError(
          `Missing cope${contrast} for subject ${subject} in directory ${directory.path}.`,
          { file, contrast, subject }
        );
      }
      return { subject, session, directory, file };
    }),
  }));
}
