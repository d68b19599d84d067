/**
 * Default configuration values for featwise
 */

import type { FeatwiseConfig } from './config-types.js';

export const DEFAULT_SUBJECT_PATTERNS = ['sub-*', 'subject-*', 'pilot-*', 'subj-*', 'subjpilot-*'];

export const DEFAULT_SESSION_PATTERNS = [
  'ses-*',
  'session-*',
  'ses_*',
  'session_*',
  'ses*',
  'session*',
  'baseline',
  'endpoint',
  'ses-001',
  'ses-002',
];

export const DEFAULT_CONFIG: FeatwiseConfig = {
  paths: {
    level1_dir: 'derivatives/fsl/level-1',
    level2_dir: 'derivatives/fsl/level-2',
    level3_dir: 'derivatives/fsl/level-3',
    fixed_effects_template: 'code/design_files/fixed-effects_design.fsf',
    mixed_effects_template: 'code/design_files/mixed-effects_design.fsf',
    standard_image: 'derivatives/templates/MNI152_T1_2mm_brain.nii.gz',
    log_dir: 'code/logs',
  },
  naming: {
    subject_patterns: DEFAULT_SUBJECT_PATTERNS,
    session_patterns: DEFAULT_SESSION_PATTERNS,
  },
  thresholds: {
    z: 2.3,
    cluster_p: 0.05,
  },
  engine: {
    command: 'feat',
    fixed_effects_on_failure: 'abort',
    // The group loop historically ignores feat's exit status and moves on
    mixed_effects_on_failure: 'continue',
  },
  limits: {
    min_runs: 2,
    min_inputs: 3,
  },
  error_reporting: {
    enabled: true,
    level: 'warn',
    max_file_size_mb: 5,
  },
};
