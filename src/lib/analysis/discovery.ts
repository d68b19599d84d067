/**
 * Result-directory discovery for one analysis tree.
 *
 * Level-1 layout: <analysis>/<subject>/<session>/func/<run>.feat
 * Level-2 layout: <analysis>/<subject>/<session>/<name>.gfeat
 */

import path from 'path';
import type { NamingConfig } from '../config-types.js';
import type { AnalysisLevel, ResultDirectory } from './types.js';
import { describeResultDirectory } from './contrasts.js';
import { findSessionDirs, findSubjectDirs, scanResultDirs } from './scanner.js';

export interface SessionCandidates {
  subject: string;
  session: string;
  sessionDir: string;
  /** Sorted; empty when the session has no result directories */
  directories: ResultDirectory[];
}

/** Where result directories of a level live inside a session directory. */
export function resultParentDir(sessionDir: string, level: AnalysisLevel): string {
  return level === 'lower' ? path.join(sessionDir, 'func') : sessionDir;
}

/** Result directories of one subject-session, described with their copes. */
export function listSessionResults(
  sessionDir: string,
  subject: string,
  session: string,
  level: AnalysisLevel
): ResultDirectory[] {
  return scanResultDirs(resultParentDir(sessionDir, level), level).map((dir) =>
    describeResultDirectory(dir, subject, session, level)
  );
}

/**
 * Every subject-session of an analysis with its result directories.
 * Pass `onlySession` to restrict discovery to one session name.
 */
export function discoverAnalysis(
  analysisDir: string,
  level: AnalysisLevel,
  naming: NamingConfig,
  onlySession?: string
): SessionCandidates[] {
  const found: SessionCandidates[] = [];

  for (const subjectDir of findSubjectDirs(analysisDir, naming.subject_patterns)) {
    const subject = path.basename(subjectDir);
    for (const sessionDir of findSessionDirs(subjectDir, naming.session_patterns)) {
      const session = path.basename(sessionDir);
      if (onlySession !== undefined && session !== onlySession) continue;
      found.push({
        subject,
        session,
        sessionDir,
        directories: listSessionResults(sessionDir, subject, session, level),
      });
    }
  }

  return found;
}

/** Subject names of an analysis, version-sorted. */
export function discoverSubjects(analysisDir: string, naming: NamingConfig): string[] {
  return findSubjectDirs(analysisDir, naming.subject_patterns).map((dir) => path.basename(dir));
}
