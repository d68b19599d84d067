import { describe, it, expect } from 'vitest';
import { createGroupSelection } from './group-selection.js';
import { reconcileSessions } from './reconcile.js';
import {
  displayPath,
  renderContrastPlans,
  renderFixedEffectsPlan,
  renderGroupSelection,
  renderReconciliation,
} from './render.js';
import { resultDir } from './test-dataset.js';
import type { FixedEffectsPlanItem } from './fixed-effects.js';

const BASE = '/data';

describe('displayPath', () => {
  it('shows paths under the base relative to it', () => {
    expect(displayPath('/data/derivatives/x.feat', BASE)).toBe('derivatives/x.feat');
  });

  it('leaves outside paths and missing bases alone', () => {
    expect(displayPath('/scratch/x.feat', BASE)).toBe('/scratch/x.feat');
    expect(displayPath('/data/x.feat')).toBe('/data/x.feat');
  });
});

describe('renderReconciliation', () => {
  const dir = (name: string, copes: number[]) => resultDir(`/data/l1/sub-01/ses-01/func/${name}`, copes);

  it('lists valid runs and warnings per subject-session', () => {
    const sessions = [
      {
        subject: 'sub-01',
        session: 'ses-01',
        sessionDir: '/data/l1/sub-01/ses-01',
        directories: [dir('run-01.feat', [1, 2]), dir('run-02.feat', [1, 2]), dir('run-03.feat', [1])],
      },
      { subject: 'sub-01', session: 'ses-02', sessionDir: '/data/l1/sub-01/ses-02', directories: [] },
    ];

    expect(renderReconciliation(sessions, reconcileSessions(sessions), BASE)).toEqual([
      '--- Subject: sub-01 | Session: ses-01 ---',
      '',
      'Valid Feat Directories:',
      '  • l1/sub-01/ses-01/func/run-01.feat',
      '  • l1/sub-01/ses-01/func/run-02.feat',
      '',
      'Warnings:',
      '  [Warning] run-03.feat does not have the common cope count 2 and will be excluded.',
      '',
      '--- Subject: sub-01 | Session: ses-02 ---',
      '',
      'No feat directories found.',
      '',
    ]);
  });

  it('explains a tie', () => {
    const sessions = [
      {
        subject: 'sub-01',
        session: 'ses-01',
        sessionDir: '/data/l1/sub-01/ses-01',
        directories: [dir('run-01.feat', [1, 2]), dir('run-02.feat', [1])],
      },
    ];

    expect(renderReconciliation(sessions, reconcileSessions(sessions))).toEqual([
      '--- Subject: sub-01 | Session: ses-01 ---',
      '',
      'Warnings:',
      '  [Warning] Unequal cope counts found across runs (2 1).',
      '',
      'Excluding subject-session sub-01:ses-01 due to tie in cope counts.',
      '',
    ]);
  });
});

describe('renderFixedEffectsPlan', () => {
  it('describes skipped and ready subject-sessions', () => {
    const runDir = resultDir('/data/l1/sub-02/ses-01/func/run-01.feat', [1], { subject: 'sub-02' });
    const items: FixedEffectsPlanItem[] = [
      { subject: 'sub-01', session: 'ses-01', status: 'excluded' },
      { subject: 'sub-02', session: 'ses-01', status: 'too-few-runs', directories: [runDir] },
    ];

    expect(renderFixedEffectsPlan(items, 2, BASE)).toEqual([
      '',
      'Subject: sub-01 | Session: ses-01',
      '----------------------------------------',
      '  - Excluded based on your selections.',
      '',
      'Subject: sub-02 | Session: ses-01',
      '----------------------------------------',
      '  - Not enough runs for fixed effects analysis (minimum 2 runs required). Skipping.',
    ]);
  });
});

describe('renderGroupSelection', () => {
  it('renders every selected directory', () => {
    const selection = createGroupSelection([
      {
        subject: 'sub-01',
        session: 'ses-01',
        directories: [
          resultDir('/data/l2/sub-01/ses-01/sub-01_ses-01_desc-fixed-effects.gfeat', [1], { level: 'higher' }),
        ],
      },
      {
        subject: 'sub-02',
        session: 'ses-01',
        directories: [resultDir('/data/l1/sub-02/ses-01/func/run-01.feat', [1], { subject: 'sub-02' })],
      },
    ]);

    expect(renderGroupSelection(selection, 'ses-01', BASE)).toEqual([
      '=== Confirm Your Selections for Mixed Effects Analysis ===',
      'Session: ses-01',
      '',
      'Subject: sub-01 | Session: ses-01',
      '----------------------------------------',
      'Higher-level Feat Directory:',
      '  - l2/sub-01/ses-01/sub-01_ses-01_desc-fixed-effects.gfeat',
      '',
      'Subject: sub-02 | Session: ses-01',
      '----------------------------------------',
      'Selected Feat Directory:',
      '  - l1/sub-02/ses-01/func/run-01.feat',
      '',
      '============================================',
    ]);
  });

  it('notes an empty selection', () => {
    expect(renderGroupSelection(createGroupSelection([]), 'ses-01')).toEqual([
      '=== Confirm Your Selections for Mixed Effects Analysis ===',
      'Session: ses-01',
      '',
      '(no subjects selected)',
      '',
      '============================================',
    ]);
  });
});

describe('renderContrastPlans', () => {
  it('lists the cope file of every input', () => {
    const directory = resultDir('/data/l1/sub-01/ses-01/func/run-01.feat', [1]);
    const plans = [
      {
        contrast: 1,
        inputs: [{ subject: 'sub-01', session: 'ses-01', directory, file: `${directory.path}/stats/cope1.nii.gz` }],
      },
    ];

    expect(renderContrastPlans(plans)).toEqual([
      '=== Cope image: cope1 ===',
      '',
      '--- Subject: sub-01 | Session: ses-01 ---',
      'Cope file:',
      '  - /data/l1/sub-01/ses-01/func/run-01.feat/stats/cope1.nii.gz',
      '',
    ]);
  });
});
