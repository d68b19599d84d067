/**
 * Cope discovery inside a single result directory and the deterministic
 * path of the cope image the engine consumes for a given index.
 */

import fs from 'fs';
import path from 'path';
import type { AnalysisLevel, ResultDirectory } from './types.js';
import { HIGHER_COPE_RE, LOWER_COPE_RE, parseCopeIndex, runFromName } from './naming.js';

function listEntries(dir: string): fs.Dirent[] {
  try {
    return fs.readdirSync(dir, { withFileTypes: true });
  } catch {
    return [];
  }
}

/** File or directory entry, following a symlink to its target. */
function entryIs(dir: string, entry: fs.Dirent, kind: 'file' | 'directory'): boolean {
  if (kind === 'file' ? entry.isFile() : entry.isDirectory()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    const target = fs.statSync(path.join(dir, entry.name));
    return kind === 'file' ? target.isFile() : target.isDirectory();
  } catch {
    // dangling link
    return false;
  }
}

/** True when a lower-level directory has its stats/ subdirectory. */
export function hasStatsDir(featDir: string): boolean {
  try {
    return fs.statSync(path.join(featDir, 'stats')).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Cope indices present in a result directory, sorted and de-duplicated.
 * Lower level scans `stats/cope<N>.nii.gz` files, higher level scans
 * `cope<N>.feat` subdirectories.
 */
export function readContrasts(dir: string, level: AnalysisLevel): number[] {
  const indices = new Set<number>();

  if (level === 'lower') {
    const statsDir = path.join(dir, 'stats');
    for (const entry of listEntries(statsDir)) {
      if (!entryIs(statsDir, entry, 'file')) continue;
      const index = parseCopeIndex(entry.name, LOWER_COPE_RE);
      if (index !== null) indices.add(index);
    }
  } else {
    for (const entry of listEntries(dir)) {
      if (!entryIs(dir, entry, 'directory')) continue;
      const index = parseCopeIndex(entry.name, HIGHER_COPE_RE);
      if (index !== null) indices.add(index);
    }
  }

  return [...indices].sort((a, b) => a - b);
}

/** Cope image for `contrast` inside `dir`. */
export function contrastFilePath(dir: Pick<ResultDirectory, 'path' | 'level'>, contrast: number): string {
  if (dir.level === 'lower') {
    return path.join(dir.path, 'stats', `cope${contrast}.nii.gz`);
  }
  // Each cope<N>.feat of a fixed-effects run holds a single 3D cope
  return path.join(dir.path, `cope${contrast}.feat`, 'stats', 'cope1.nii.gz');
}

/** Build the record for a directory found on disk. */
export function describeResultDirectory(
  dirPath: string,
  subject: string,
  session: string,
  level: AnalysisLevel
): ResultDirectory {
  const described: ResultDirectory = {
    path: dirPath,
    subject,
    session,
    run: runFromName(path.basename(dirPath)),
    level,
    contrasts: readContrasts(dirPath, level),
  };
  if (level === 'lower' && !hasStatsDir(dirPath)) described.missingStats = true;
  return described;
}
