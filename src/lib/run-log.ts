/**
 * Run log: everything a command prints to the console is mirrored into
 * <log_dir>/<command>_YYYYMMDD_HHMMSS.log so a session can be reviewed later.
 */

import fs from 'fs';
import path from 'path';
import { getLogDir } from './config.js';
import { logWarn } from './fault-logger.js';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local-time stamp used in run log file names, e.g. 20240131_142501 */
export function formatLogTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export interface RunLogOptions {
  logDir?: string;
  now?: Date;
}

export class RunLog {
  readonly filePath: string;
  private fileBroken = false;

  constructor(command: string, options: RunLogOptions = {}) {
    const logDir = options.logDir ?? getLogDir();
    this.filePath = path.join(logDir, `${command}_${formatLogTimestamp(options.now ?? new Date())}.log`);
  }

  /** Print a line (or block) to stdout and the log file. */
  print(message: string = ''): void {
    console.log(message);
    this.append(message);
  }

  warn(message: string): void {
    console.warn(message);
    this.append(message);
  }

  error(message: string): void {
    console.error(message);
    this.append(message);
  }

  /** Section header in the `=== Title ===` style, preceded by a blank line. */
  section(title: string): void {
    this.print(`\n=== ${title} ===`);
  }

  /** Write to the log file only (captured tool output). */
  record(text: string): void {
    this.append(text.endsWith('\n') ? text.slice(0, -1) : text);
  }

  private append(message: string): void {
    if (this.fileBroken) return;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.appendFileSync(this.filePath, message + '\n');
    } catch (error) {
      this.fileBroken = true;
      logWarn('run-log', `Cannot write run log ${this.filePath}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

export function createRunLog(command: string, options: RunLogOptions = {}): RunLog {
  return new RunLog(command, options);
}
