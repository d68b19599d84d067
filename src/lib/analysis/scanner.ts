/**
 * Directory Scanner
 *
 * Finds subject, session, run and analysis directories by name pattern.
 * A missing base path is a normal "nothing here" and yields an empty list.
 */

import fs from 'fs';
import path from 'path';
import { globSync } from 'glob';
import { naturalSortUnique } from './naming.js';
import type { AnalysisLevel } from './types.js';

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Immediate subdirectories of `base` whose names match any of `patterns`
 * (globs such as `sub-*` or literal names such as `baseline`).
 * Paths are de-duplicated and version-sorted.
 */
export function scanDirectories(base: string, patterns: string[]): string[] {
  if (patterns.length === 0 || !isDirectory(base)) return [];

  const matches = globSync(patterns, { cwd: base, dot: false });
  const dirs = matches
    // depth 1 only; patterns are plain names
    .filter((rel) => !rel.includes('/') && !rel.includes(path.sep))
    .map((rel) => path.join(base, rel))
    .filter(isDirectory);

  return naturalSortUnique(dirs);
}

const RESULT_SUFFIX: Record<AnalysisLevel, string> = {
  lower: '.feat',
  higher: '.gfeat',
};

const RESULT_SUFFIXES = Object.values(RESULT_SUFFIX);

/** Result directories (`*.feat` or `*.gfeat`) directly inside `dir`. */
export function scanResultDirs(dir: string, level: AnalysisLevel): string[] {
  return scanDirectories(dir, [`*${RESULT_SUFFIX[level]}`]);
}

export interface AnalysisDirOptions {
  /** Keep only analyses whose directory name contains this text */
  nameContains?: string;
}

/**
 * Analysis directories under `base` holding at least one result directory of
 * the given level anywhere beneath them.
 */
export function findAnalysisDirs(
  base: string,
  level: AnalysisLevel,
  options: AnalysisDirOptions = {}
): string[] {
  const suffix = RESULT_SUFFIX[level];
  const found: string[] = [];

  for (const dir of scanDirectories(base, ['*'])) {
    if (options.nameContains && !path.basename(dir).includes(options.nameContains)) continue;

    // Don't descend into result directories: they hold thousands of files
    const hits = globSync(`**/*${suffix}`, {
      cwd: dir,
      ignore: {
        childrenIgnored: (p) => RESULT_SUFFIXES.some((s) => p.name.endsWith(s)),
      },
    });
    if (hits.some((rel) => isDirectory(path.join(dir, rel)))) {
      found.push(dir);
    }
  }

  return found;
}

/** Subject directories of an analysis. */
export function findSubjectDirs(analysisDir: string, subjectPatterns: string[]): string[] {
  return scanDirectories(analysisDir, subjectPatterns);
}

/** Session directories of a subject. */
export function findSessionDirs(subjectDir: string, sessionPatterns: string[]): string[] {
  return scanDirectories(subjectDir, sessionPatterns);
}

/** Unique session names across every subject of an analysis, version-sorted. */
export function findSessionNames(
  analysisDir: string,
  subjectPatterns: string[],
  sessionPatterns: string[]
): string[] {
  const names: string[] = [];
  for (const subjectDir of findSubjectDirs(analysisDir, subjectPatterns)) {
    for (const sessionDir of findSessionDirs(subjectDir, sessionPatterns)) {
      names.push(path.basename(sessionDir));
    }
  }
  return naturalSortUnique(names);
}
