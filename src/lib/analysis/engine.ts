/**
 * Engine runner: invokes the FEAT engine on one design file.
 *
 * Output (stdout and stderr interleaved) is captured for the run log rather
 * than streamed to the terminal. A non-zero exit resolves normally; only a
 * failure to start the process rejects.
 */

import spawn from 'cross-spawn';
import { ConfigError, EngineError } from '../errors.js';

export interface EngineRunResult {
  designPath: string;
  exitCode: number | null;
  output: string;
  durationMs: number;
}

export interface EngineRunOptions {
  cwd?: string;
  /** Aborting kills the engine and rejects with the signal's reason */
  signal?: AbortSignal;
}

/** Split a configured command line ("feat", "fsl_sub -q short.q feat") into program and arguments. */
export function splitCommand(command: string): { program: string; args: string[] } {
  const [program, ...args] = command.trim().split(/\s+/).filter(Boolean);
  if (!program) {
    throw new ConfigError('Engine command is empty', { command });
  }
  return { program, args };
}

export function runEngine(command: string, designPath: string, options: EngineRunOptions = {}): Promise<EngineRunResult> {
  const { program, args } = splitCommand(command);
  const start = Date.now();

  return new Promise((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(options.signal.reason);
      return;
    }

    const proc = spawn(program, [...args, designPath], {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    let output = '';
    proc.stdout?.on('data', (data: Buffer) => {
      output += data.toString();
    });
    proc.stderr?.on('data', (data: Buffer) => {
      output += data.toString();
    });

    const onAbort = (): void => {
      proc.kill('SIGTERM');
      reject(options.signal?.reason);
    };
    options.signal?.addEventListener('abort', onAbort, { once: true });

    proc.on('close', (code: number | null) => {
      options.signal?.removeEventListener('abort', onAbort);
      resolve({ designPath, exitCode: code, output, durationMs: Date.now() - start });
    });

    proc.on('error', (err: Error) => {
      options.signal?.removeEventListener('abort', onAbort);
      reject(new EngineError(`Could not start ${program}: ${err.message}`, null, { designPath }));
    });
  });
}
