/**
 * Builders for throwaway dataset trees used by the analysis tests.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { AnalysisLevel, ResultDirectory } from './types.js';

export function makeTempDir(prefix: string = 'featwise-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

function touch(file: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, '');
}

/** `<parent>/<name>/stats/cope1..N.nii.gz` (or the listed indices) */
export function makeFeatDir(parent: string, name: string, copes: number | number[]): string {
  const dir = path.join(parent, name);
  fs.mkdirSync(path.join(dir, 'stats'), { recursive: true });
  const indices = Array.isArray(copes) ? copes : Array.from({ length: copes }, (_, i) => i + 1);
  for (const i of indices) {
    touch(path.join(dir, 'stats', `cope${i}.nii.gz`));
  }
  return dir;
}

/** `<parent>/<name>/cope<N>.feat/stats/cope1.nii.gz` for each index */
export function makeGfeatDir(parent: string, name: string, copes: number | number[]): string {
  const dir = path.join(parent, name);
  fs.mkdirSync(dir, { recursive: true });
  const indices = Array.isArray(copes) ? copes : Array.from({ length: copes }, (_, i) => i + 1);
  for (const i of indices) {
    touch(path.join(dir, `cope${i}.feat`, 'stats', 'cope1.nii.gz'));
  }
  return dir;
}

/** In-memory record, for tests that never touch the disk. */
export function resultDir(
  dirPath: string,
  contrasts: number[],
  extra: { subject?: string; session?: string; run?: string; level?: AnalysisLevel } = {}
): ResultDirectory {
  return {
    path: dirPath,
    subject: extra.subject ?? 'sub-01',
    session: extra.session ?? 'ses-01',
    run: extra.run,
    level: extra.level ?? 'lower',
    contrasts,
  };
}
