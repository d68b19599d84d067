import { describe, it, expect } from 'vitest';
import {
  HIGHER_COPE_RE,
  LOWER_COPE_RE,
  compareNatural,
  isValidLabel,
  naturalSortUnique,
  normalizeRunNumber,
  parseCopeIndex,
  runFromName,
} from './naming.js';

describe('naming', () => {
  describe('compareNatural', () => {
    it('orders digit runs by value', () => {
      expect(compareNatural('sub-2', 'sub-10')).toBeLessThan(0);
      expect(compareNatural('sub-10', 'sub-9')).toBeGreaterThan(0);
    });

    it('falls back to code-unit order when values tie', () => {
      expect(compareNatural('run-01', 'run-1')).toBeLessThan(0);
      expect(compareNatural('ses-01', 'ses-01')).toBe(0);
    });

    it('compares text chunks lexically', () => {
      expect(compareNatural('pilot-1', 'sub-1')).toBeLessThan(0);
    });
  });

  it('naturalSortUnique removes duplicates and version-sorts', () => {
    expect(naturalSortUnique(['sub-10', 'sub-2', 'sub-2', 'sub-1'])).toEqual(['sub-1', 'sub-2', 'sub-10']);
  });

  describe('normalizeRunNumber', () => {
    it('strips the run- prefix and leading zeros', () => {
      expect(normalizeRunNumber('run-01')).toBe('1');
      expect(normalizeRunNumber('007')).toBe('7');
      expect(normalizeRunNumber(' 2 ')).toBe('2');
    });

    it('keeps a lone zero', () => {
      expect(normalizeRunNumber('0')).toBe('0');
      expect(normalizeRunNumber('run-000')).toBe('0');
    });

    it('rejects labels without a number', () => {
      expect(normalizeRunNumber('abc')).toBeNull();
      expect(normalizeRunNumber('')).toBeNull();
      expect(normalizeRunNumber('1a')).toBeNull();
    });
  });

  describe('runFromName', () => {
    it('takes the last run-<digits> fragment', () => {
      expect(runFromName('sub-01_task-nback_run-02.feat')).toBe('02');
      expect(runFromName('run-1_run-3.feat')).toBe('3');
    });

    it('returns undefined when the name has no run', () => {
      expect(runFromName('sub-01_task-nback.feat')).toBeUndefined();
    });
  });

  describe('parseCopeIndex', () => {
    it('reads lower-level cope files', () => {
      expect(parseCopeIndex('cope12.nii.gz', LOWER_COPE_RE)).toBe(12);
      expect(parseCopeIndex('cope1.nii', LOWER_COPE_RE)).toBeNull();
      expect(parseCopeIndex('varcope1.nii.gz', LOWER_COPE_RE)).toBeNull();
    });

    it('reads higher-level cope directories', () => {
      expect(parseCopeIndex('cope3.feat', HIGHER_COPE_RE)).toBe(3);
      expect(parseCopeIndex('cope3.gfeat', HIGHER_COPE_RE)).toBeNull();
    });

    it('rejects index zero', () => {
      expect(parseCopeIndex('cope0.nii.gz', LOWER_COPE_RE)).toBeNull();
    });
  });

  it('isValidLabel accepts letters and digits only', () => {
    expect(isValidLabel('memory')).toBe(true);
    expect(isValidLabel('postICA2')).toBe(true);
    expect(isValidLabel('task-1')).toBe(false);
    expect(isValidLabel('')).toBe(false);
  });
});
