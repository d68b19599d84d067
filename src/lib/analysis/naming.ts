/**
 * Naming conventions shared by discovery, selection and design generation:
 * version-aware ordering, run labels and cope artifact names.
 */

const CHUNK_RE = /\d+|\D+/g;
const DIGITS_RE = /^\d+$/;

function compareDigitRuns(x: string, y: string): number {
  const a = x.replace(/^0+/, '');
  const b = y.replace(/^0+/, '');
  if (a.length !== b.length) return a.length - b.length;
  if (a !== b) return a < b ? -1 : 1;
  return 0;
}

/**
 * Version-aware comparison: digit runs compare by value, so `sub-2` sorts
 * before `sub-10`. Ties fall back to plain code-unit order.
 */
export function compareNatural(a: string, b: string): number {
  const ca = a.match(CHUNK_RE) ?? [];
  const cb = b.match(CHUNK_RE) ?? [];
  const n = Math.min(ca.length, cb.length);

  for (let i = 0; i < n; i++) {
    const x = ca[i];
    const y = cb[i];
    if (DIGITS_RE.test(x) && DIGITS_RE.test(y)) {
      const cmp = compareDigitRuns(x, y);
      if (cmp !== 0) return cmp;
    } else if (x !== y) {
      return x < y ? -1 : 1;
    }
  }

  if (ca.length !== cb.length) return ca.length - cb.length;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** De-duplicate and version-sort. */
export function naturalSortUnique(values: Iterable<string>): string[] {
  return [...new Set(values)].sort(compareNatural);
}

// ============================================================================
// Runs
// ============================================================================

/**
 * Normalise a user-typed or on-disk run label: `run-01`, `01` and `1` all
 * become "1". Returns null when no number is left.
 */
export function normalizeRunNumber(label: string): string | null {
  const digits = label.trim().split('run-').join('');
  if (!DIGITS_RE.test(digits)) return null;
  return digits.replace(/^0+/, '') || '0';
}

/** Run digits embedded in a directory name (`..._run-01.feat` → "01"), last occurrence wins. */
export function runFromName(name: string): string | undefined {
  const matches = [...name.matchAll(/run-(\d+)/g)];
  const last = matches[matches.length - 1];
  return last ? last[1] : undefined;
}

// ============================================================================
// Cope artifacts
// ============================================================================

/** Lower level: `<feat>/stats/cope<N>.nii.gz` */
export const LOWER_COPE_RE = /^cope(\d+)\.nii\.gz$/;

/** Higher level: `<gfeat>/cope<N>.feat/` */
export const HIGHER_COPE_RE = /^cope(\d+)\.feat$/;

/** Positive cope index from an artifact name, or null when it doesn't follow the pattern. */
export function parseCopeIndex(name: string, pattern: RegExp): number | null {
  const match = pattern.exec(name);
  if (!match) return null;
  const index = Number.parseInt(match[1], 10);
  return index > 0 ? index : null;
}

// ============================================================================
// Output labels
// ============================================================================

const LABEL_RE = /^[A-Za-z0-9]+$/;

/** True for a usable `task-<label>` / `desc-<label>` value (alphanumeric only). */
export function isValidLabel(value: string): boolean {
  return LABEL_RE.test(value);
}
