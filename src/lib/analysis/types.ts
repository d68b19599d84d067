/**
 * Higher-level analysis: type definitions
 *
 * Records discovered on disk for one featwise invocation. Nothing here is
 * persisted; each run scans the dataset afresh.
 */

// ============================================================================
// Result directories
// ============================================================================

/** `lower` = run-level `.feat`, `higher` = fixed-effects `.gfeat` */
export type AnalysisLevel = 'lower' | 'higher';

export interface ResultDirectory {
  path: string;
  subject: string;
  session: string;
  /** Run label digits as written on disk ("01"), when the name carries one */
  run?: string;
  level: AnalysisLevel;
  /** Sorted, de-duplicated cope indices found on disk */
  contrasts: number[];
  /** Lower level only: the directory has no stats/ and counts zero copes */
  missingStats?: boolean;
}

// ============================================================================
// Reconciliation
// ============================================================================

export interface ExcludedDirectory {
  directory: ResultDirectory;
  reason: string;
}

export type ReconcileResult =
  | {
      status: 'accepted';
      commonCount: number;
      valid: ResultDirectory[];
      excluded: ExcludedDirectory[];
      warnings: string[];
    }
  | {
      status: 'tie';
      /** Distinct counts in first-seen order */
      counts: number[];
      warnings: string[];
    }
  | {
      status: 'no-majority';
      /** Distinct counts in first-seen order */
      counts: number[];
      warnings: string[];
    };

export interface SubjectSessionGroup {
  subject: string;
  session: string;
  /** Every result directory found for the pair, sorted */
  candidates: ResultDirectory[];
  reconciliation: ReconcileResult;
}

// ============================================================================
// Selection
// ============================================================================

export type SelectionPolarity = 'include' | 'exclude';

export interface SelectionRule {
  polarity: SelectionPolarity;
  subject: string;
  session?: string;
  /** Normalised run numbers ("1", "12") */
  runs?: string[];
  /** The token as typed */
  token: string;
}

export type SelectionOutcome =
  | { subject: string; session: string; status: 'excluded' }
  | { subject: string; session: string; status: 'selected'; directories: ResultDirectory[] };

// ============================================================================
// Group (mixed-effects) selection
// ============================================================================

export interface GroupEntry {
  subject: string;
  session: string;
  directories: ResultDirectory[];
}

/** Immutable selection threaded through the modify loop */
export interface GroupSelection {
  readonly entries: readonly GroupEntry[];
}

export interface ContrastInput {
  subject: string;
  session: string;
  directory: ResultDirectory;
  /** Cope image fed to the engine for this contrast */
  file: string;
}

export interface ContrastPlan {
  contrast: number;
  inputs: ContrastInput[];
}

// ============================================================================
// Design generation
// ============================================================================

export interface DesignSpec {
  outputDir: string;
  standardImage: string;
  zThreshold: string;
  clusterPThreshold: string;
  /** Paths written into `feat_files(i)`, numbered 1..N in this order */
  inputs: string[];
  /** Value forced into `fmri(ncopeinputs)` and expanded by @COPEINPUTS@ */
  copeCount: number;
}

export interface GeneratedDesign {
  designPath: string;
  /** What gets removed once the engine is done (design file or its directory) */
  cleanupPath: string;
  /** Directory the engine is expected to create */
  engineOutput: string;
}
