import { describe, it, expect } from 'vitest';
import { SelectionError } from '../errors.js';
import { applySelection, parseSelection, type SelectableSession } from './selection.js';
import type { SelectionOutcome } from './types.js';
import { resultDir } from './test-dataset.js';

const SUBJECTS = ['sub-01', 'sub-02', 'sub-03', 'sub-04'];

function session(subject: string, name: string, runs: number[]): SelectableSession {
  return {
    subject,
    session: name,
    directories: runs.map((r) =>
      resultDir(`/d/${subject}/${name}/func/${subject}_run-0${r}.feat`, [1], { subject, session: name, run: `0${r}` })
    ),
  };
}

// Unordered on purpose: applySelection sorts
const SESSIONS = [
  session('sub-02', 'ses-01', [1, 2]),
  session('sub-01', 'ses-02', [1, 2]),
  session('sub-01', 'ses-01', [1, 2, 3]),
  session('sub-03', 'ses-01', [1, 2]),
];

function summarize(outcomes: SelectionOutcome[]): Array<[string, string, string[] | 'excluded']> {
  return outcomes.map((o) => [
    o.subject,
    o.session,
    o.status === 'excluded' ? 'excluded' : o.directories.map((d) => d.run ?? ''),
  ]);
}

function select(input: string) {
  return summarize(applySelection(SESSIONS, parseSelection(input, SUBJECTS)));
}

describe('parseSelection', () => {
  it('parses include and exclude tokens', () => {
    expect(parseSelection('sub-01:ses-01:02,03 -sub-03:ses-01 -sub-04', SUBJECTS)).toEqual([
      { polarity: 'include', subject: 'sub-01', session: 'ses-01', runs: ['2', '3'], token: 'sub-01:ses-01:02,03' },
      { polarity: 'exclude', subject: 'sub-03', session: 'ses-01', runs: undefined, token: '-sub-03:ses-01' },
      { polarity: 'exclude', subject: 'sub-04', session: undefined, runs: undefined, token: '-sub-04' },
    ]);
  });

  it('normalizes run labels', () => {
    const [rule] = parseSelection('sub-01:ses-01:run-01,007', SUBJECTS);
    expect(rule.runs).toEqual(['1', '7']);
  });

  it('treats empty input as no rules', () => {
    expect(parseSelection('   ', SUBJECTS)).toEqual([]);
  });

  it('reports every invalid token at once', () => {
    let caught: unknown;
    try {
      parseSelection("sub-01 sub-09 a:b:c:d - sub-01:ses-01:x", SUBJECTS);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SelectionError);
    if (!(caught instanceof SelectionError)) return;
    expect(caught.invalid).toEqual([
      'sub-09 (Subject not found)',
      "a:b:c:d (Too many ':' separated fields)",
      '- (No subject given)',
      "sub-01:ses-01:x (Invalid run 'x')",
    ]);
    expect(caught.message).toBe(
      'The following selections are invalid:\n' +
        '  - sub-09 (Subject not found)\n' +
        "  - a:b:c:d (Too many ':' separated fields)\n" +
        '  - - (No subject given)\n' +
        "  - sub-01:ses-01:x (Invalid run 'x')"
    );
  });
});

describe('applySelection', () => {
  it('returns the full universe, sorted, for no rules', () => {
    expect(select('')).toEqual([
      ['sub-01', 'ses-01', ['01', '02', '03']],
      ['sub-01', 'ses-02', ['01', '02']],
      ['sub-02', 'ses-01', ['01', '02']],
      ['sub-03', 'ses-01', ['01', '02']],
    ]);
  });

  it('applies inclusion overrides and exclusions together', () => {
    expect(select('sub-01:ses-01:1,3 -sub-01:ses-02 -sub-03 -sub-02:ses-01:02')).toEqual([
      ['sub-01', 'ses-01', ['01', '03']],
      ['sub-01', 'ses-02', 'excluded'],
      ['sub-02', 'ses-01', ['01']],
      ['sub-03', 'ses-01', 'excluded'],
    ]);
  });

  it('unions the runs of repeated inclusion tokens', () => {
    expect(select('sub-01:ses-01:1 sub-01:ses-01:2')[0]).toEqual(['sub-01', 'ses-01', ['01', '02']]);
  });

  it('keeps all runs when one inclusion for the session names none', () => {
    expect(select('sub-01:ses-01 sub-01:ses-01:1')[0]).toEqual(['sub-01', 'ses-01', ['01', '02', '03']]);
  });

  it('ignores an inclusion token without a session', () => {
    expect(select('sub-01')).toEqual(select(''));
  });

  it('removes excluded runs after inclusion filtering', () => {
    expect(select('sub-01:ses-01:1,2 -sub-01:ses-01:2')[0]).toEqual(['sub-01', 'ses-01', ['01']]);
  });

  it('can leave a session with no runs', () => {
    expect(select('sub-02:ses-01:5')[2]).toEqual(['sub-02', 'ses-01', []]);
  });
});
