/**
 * Shared helpers for the interactive commands: prompts with flag overrides,
 * threshold and label validation, top-level error reporting.
 */

import path from 'path';
import { confirm, input, select } from '@inquirer/prompts';
import type { EngineFailurePolicy } from '../lib/config.js';
import {
  CancelledError,
  EngineError,
  SelectionError,
  ValidationError,
  isFeatwiseError,
  isPromptExit,
} from '../lib/errors.js';
import { logError } from '../lib/fault-logger.js';
import type { RunLog } from '../lib/run-log.js';
import { isValidLabel } from '../lib/analysis/naming.js';
import { parseSelection, SELECTION_HELP } from '../lib/analysis/selection.js';
import { displayPath } from '../lib/analysis/render.js';
import type { SelectionRule } from '../lib/analysis/types.js';
import type { SessionOutcome } from '../lib/analysis/session.js';

export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

// ============================================================================
// Choosing
// ============================================================================

/**
 * Pick one directory: by name when `preferred` is given (flag), otherwise
 * through a prompt. Non-interactive runs only succeed with a single option.
 */
export async function chooseDirectory(
  dirs: string[],
  preferred: string | undefined,
  message: string,
  base: string
): Promise<string> {
  if (preferred !== undefined) {
    const match = dirs.find((d) => path.basename(d) === preferred || d === path.resolve(preferred));
    if (!match) {
      throw new ValidationError(`${preferred} is not one of: ${dirs.map((d) => path.basename(d)).join(', ')}`);
    }
    return match;
  }
  if (dirs.length === 1 && !isInteractive()) return dirs[0];
  if (!isInteractive()) {
    throw new ValidationError(`${message}: several candidates found; pass the name as an option`);
  }
  return select({
    message,
    choices: dirs.map((d) => ({ name: displayPath(d, base), value: d })),
  });
}

export async function chooseName(names: string[], preferred: string | undefined, message: string): Promise<string> {
  if (preferred !== undefined) {
    if (!names.includes(preferred)) {
      throw new ValidationError(`${preferred} is not one of: ${names.join(', ')}`);
    }
    return preferred;
  }
  if (names.length === 1 && !isInteractive()) return names[0];
  if (!isInteractive()) {
    throw new ValidationError(`${message}: several candidates found; pass the name as an option`);
  }
  return select({ message, choices: names.map((n) => ({ name: n, value: n })) });
}

// ============================================================================
// Selection
// ============================================================================

/**
 * Read selection rules. A `--select` value is parsed once and fails hard;
 * at the prompt an invalid input is reported and asked for again.
 */
export async function promptSelection(
  subjects: string[],
  preset: string | undefined,
  log: RunLog
): Promise<SelectionRule[]> {
  if (preset !== undefined) {
    log.record(`Selection: ${preset || '(all)'}`);
    return parseSelection(preset, subjects);
  }
  if (!isInteractive()) return [];

  log.print(SELECTION_HELP);
  log.print('\nPress Enter/Return to include all by default.\n');

  for (;;) {
    const answer = await input({ message: 'Enter subject, session, and run selections (or press Enter/Return for all):' });
    log.record(`> ${answer}`);
    try {
      return parseSelection(answer, subjects);
    } catch (error) {
      if (!(error instanceof SelectionError)) throw error;
      log.warn(`\nWarning: ${error.message}\nPlease check your input and try again.\n`);
    }
  }
}

// ============================================================================
// Thresholds and labels
// ============================================================================

/** Accepts a positive decimal number as typed (`2.3`, `3.1`, `.01`). */
export function validateThreshold(value: string): true | string {
  const trimmed = value.trim();
  if (!/^(\d+\.?\d*|\.\d+)$/.test(trimmed) || Number(trimmed) <= 0) {
    return `"${value}" is not a positive number`;
  }
  return true;
}

function checkedThreshold(value: string, name: string): string {
  const verdict = validateThreshold(value);
  if (verdict !== true) {
    throw new ValidationError(`Invalid ${name}: ${verdict}`);
  }
  return value.trim();
}

export interface Thresholds {
  zThreshold: string;
  clusterPThreshold: string;
}

/** Thresholds from flags, then the prompt, then the configured defaults. */
export async function promptThresholds(
  preset: { zThreshold?: string; clusterP?: string },
  defaults: { z: number; cluster_p: number },
  stage: string,
  log: RunLog
): Promise<Thresholds> {
  const interactive = isInteractive();
  if (interactive && (preset.zThreshold === undefined || preset.clusterP === undefined)) {
    log.section('FEAT Thresholding Options');
    log.print(`You can specify the Z threshold and Cluster P threshold for the ${stage}.`);
    log.print(
      `Press Enter/Return to use default values (Z threshold: ${defaults.z}, Cluster P threshold: ${defaults.cluster_p}).\n`
    );
  }

  const ask = async (flag: string | undefined, fallback: number, message: string, name: string): Promise<string> => {
    if (flag !== undefined) return checkedThreshold(flag, name);
    if (!interactive) return String(fallback);
    const answer = await input({ message, default: String(fallback), validate: validateThreshold });
    return checkedThreshold(answer, name);
  };

  const zThreshold = await ask(preset.zThreshold, defaults.z, 'Enter Z threshold:', 'Z threshold');
  const clusterPThreshold = await ask(preset.clusterP, defaults.cluster_p, 'Enter Cluster P threshold:', 'Cluster P threshold');
  log.record(`Using Z threshold: ${zThreshold}`);
  log.record(`Using Cluster P threshold: ${clusterPThreshold}`);
  return { zThreshold, clusterPThreshold };
}

function validateOptionalLabel(value: string): true | string {
  const trimmed = value.trim();
  return trimmed === '' || isValidLabel(trimmed) ? true : 'Use letters and digits only';
}

/** Optional `task-`/`desc-` label; empty means none. */
export async function promptLabel(preset: string | undefined, message: string): Promise<string | undefined> {
  if (preset !== undefined) {
    const trimmed = preset.trim();
    if (validateOptionalLabel(trimmed) !== true) {
      throw new ValidationError(`Invalid label "${preset}": use letters and digits only`);
    }
    return trimmed || undefined;
  }
  if (!isInteractive()) return undefined;
  const answer = await input({ message, default: '', validate: validateOptionalLabel });
  return answer.trim() || undefined;
}

export function parseFailurePolicy(value: string | undefined, fallback: EngineFailurePolicy): EngineFailurePolicy {
  if (value === undefined) return fallback;
  if (value === 'abort' || value === 'continue') return value;
  throw new ValidationError(`--on-engine-failure must be "abort" or "continue", got "${value}"`);
}

/** Confirmation used before running the engine; `--yes` skips it. */
export function runConfirmation(yes: boolean | undefined, message: string): () => Promise<boolean> {
  if (yes) return async () => true;
  if (!isInteractive()) {
    return async () => {
      throw new ValidationError('Refusing to run the engine without confirmation; pass --yes');
    };
  }
  return () => confirm({ message, default: true });
}

// ============================================================================
// Reporting
// ============================================================================

export function reportOutcome(outcome: SessionOutcome, log: RunLog): void {
  switch (outcome.status) {
    case 'cancelled':
      log.print(`Cancelled (${outcome.reason}); ${outcome.generated} generated design(s) removed.`);
      process.exitCode = 130;
      return;
    case 'aborted':
      log.error(outcome.error.message);
      process.exitCode = 1;
      return;
    case 'completed': {
      const failed = outcome.results.filter((r) => !r.ok);
      log.section('Summary');
      for (const r of outcome.results) {
        log.print(`  ${r.ok ? '✓' : '✗'} ${r.job.label} → ${r.job.engineOutput}`);
      }
      if (failed.length > 0) {
        log.warn(`${failed.length} of ${outcome.results.length} engine run(s) failed; see ${log.filePath}`);
        process.exitCode = 1;
      }
      return;
    }
  }
}

/**
 * Last stop for errors thrown by a command: print, record, set the exit code.
 * Cancellation is not a failure and is not recorded as a fault.
 */
export function handleCommandError(error: unknown, command: string, log?: RunLog): void {
  const print = (message: string): void => (log ? log.error(message) : console.error(message));

  if (error instanceof CancelledError || isPromptExit(error)) {
    print('\nCancelled.');
    process.exitCode = 130;
    return;
  }

  const message = error instanceof Error ? error.message : String(error);
  print(`\nError: ${message}`);
  logError(command, message, error instanceof Error ? error : undefined, {
    code: isFeatwiseError(error) ? error.code : undefined,
    exitCode: error instanceof EngineError ? error.exitCode : undefined,
  });
  process.exitCode = 1;
}
