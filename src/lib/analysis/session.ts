/**
 * Session controller: GENERATE_CONFIGS → CONFIRM_RUN → run or cancel.
 *
 * Designs are written into an ArtifactScope before the user is asked to
 * proceed. Whatever happens next (decline, Ctrl+C, engine abort, a thrown
 * error, or a finished run), the scope is disposed and no generated design
 * survives, nor any output directory created for one that received no engine
 * output. Engine runs are strictly sequential.
 */

import fs from 'fs';
import path from 'path';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import ora from 'ora';
import type { EngineFailurePolicy } from '../config-types.js';
import { CancelledError, EngineError, isPromptExit } from '../errors.js';
import { logInfo, logWarn } from '../fault-logger.js';
import type { RunLog } from '../run-log.js';
import { ArtifactScope } from './artifacts.js';
import { assertDesignInputs, writeDesign } from './design.js';
import { runEngine } from './engine.js';
import type { DesignSpec, GeneratedDesign } from './types.js';

export interface DesignJob extends GeneratedDesign {
  /** Short name used in messages ("sub-01 ses-01", "cope3") */
  label: string;
  templatePath: string;
  spec: DesignSpec;
}

export interface JobResult {
  job: DesignJob;
  exitCode: number | null;
  ok: boolean;
}

export type SessionOutcome =
  | { status: 'cancelled'; generated: number; reason: string }
  | { status: 'completed'; results: JobResult[] }
  | { status: 'aborted'; results: JobResult[]; error: EngineError };

export interface SessionOptions {
  engineCommand: string;
  onFailure: EngineFailurePolicy;
  log: RunLog;
  /** Resolves true to run the engine; false or an ExitPromptError cancels */
  confirm: () => Promise<boolean>;
  scope?: ArtifactScope;
  cwd?: string;
}

// ============================================================================
// Generation
// ============================================================================

/** Outermost ancestor of `dir` (or `dir` itself) that does not exist yet. */
function firstMissingAncestor(dir: string): string | null {
  let missing: string | null = null;
  let current = dir;
  while (!fs.existsSync(current)) {
    missing = current;
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return missing;
}

async function generateDesigns(
  jobs: DesignJob[],
  scope: ArtifactScope,
  log: RunLog,
  progress: { generated: number }
): Promise<void> {
  // Every template and image is checked before the first file is written
  for (const job of jobs) {
    assertDesignInputs(job.templatePath, job.spec.standardImage);
  }

  for (const job of jobs) {
    scope.throwIfAborted();
    const createdDir = firstMissingAncestor(path.dirname(job.designPath));
    if (createdDir) scope.registerDirectory(createdDir, 'output directory');
    // Registered first so a partially written design is still cleaned up
    scope.register(job.cleanupPath, job.label);
    writeDesign(job.templatePath, job.designPath, job.spec);
    progress.generated++;
    log.print(`Generated design for ${job.label}: ${job.designPath}`);
    await yieldToEventLoop();
  }
  scope.throwIfAborted();
}

async function askToProceed(confirm: () => Promise<boolean>): Promise<boolean> {
  try {
    return await confirm();
  } catch (error) {
    if (isPromptExit(error)) return false;
    throw error;
  }
}

// ============================================================================
// Execution
// ============================================================================

async function runJob(job: DesignJob, options: SessionOptions, scope: ArtifactScope): Promise<JobResult> {
  const spinner = ora(`Running ${options.engineCommand} for ${job.label}`).start();
  options.log.record(`$ ${options.engineCommand} ${job.designPath}`);

  try {
    const result = await runEngine(options.engineCommand, job.designPath, { signal: scope.signal, cwd: options.cwd });
    if (result.output) options.log.record(result.output);

    const ok = result.exitCode === 0;
    const seconds = (result.durationMs / 1000).toFixed(1);
    if (ok) {
      spinner.succeed(`${job.label} finished in ${seconds}s`);
      options.log.record(`${job.label} finished in ${seconds}s`);
    } else {
      const message = `${job.label} failed (exit code ${result.exitCode ?? 'none'})`;
      spinner.fail(message);
      options.log.record(message);
      logWarn('session', message, { designPath: job.designPath, engineOutput: job.engineOutput });
    }
    return { job, exitCode: result.exitCode, ok };
  } catch (error) {
    spinner.fail(`${job.label} did not complete`);
    throw error;
  } finally {
    scope.release(job.cleanupPath);
  }
}

/**
 * Generate every design, ask for confirmation, then run the engine on each
 * design in order.
 */
export async function runDesignSession(jobs: DesignJob[], options: SessionOptions): Promise<SessionOutcome> {
  const scope = options.scope ?? new ArtifactScope();
  const { log } = options;
  const progress = { generated: 0 };

  scope.arm();
  try {
    await generateDesigns(jobs, scope, log, progress);

    if (!(await askToProceed(options.confirm))) {
      log.print('Cancelled. Removing generated design files.');
      return { status: 'cancelled', generated: progress.generated, reason: 'declined' };
    }

    const results: JobResult[] = [];
    for (const job of jobs) {
      scope.throwIfAborted();
      const result = await runJob(job, options, scope);
      results.push(result);

      if (!result.ok && options.onFailure === 'abort') {
        const error = new EngineError(`Engine failed for ${job.label}; remaining designs were not run.`, result.exitCode, {
          designPath: job.designPath,
        });
        return { status: 'aborted', results, error };
      }
    }
    return { status: 'completed', results };
  } catch (error) {
    if (error instanceof CancelledError) {
      log.print(`${error.message}. Removing generated design files.`);
      return { status: 'cancelled', generated: progress.generated, reason: 'interrupted' };
    }
    throw error;
  } finally {
    const failed = scope.dispose();
    for (const artifactPath of failed) {
      log.warn(`Could not remove ${artifactPath}`);
    }
    logInfo('session', `Session finished; ${failed.length} artifact(s) left behind`);
  }
}
