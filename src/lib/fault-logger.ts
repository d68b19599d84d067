/**
 * Fault logger for featwise.
 *
 * Appends JSON lines to <log_dir>/featwise-faults.log with size-based
 * rotation. User-facing output goes through run-log.ts instead; this channel
 * records diagnostics (config problems, engine failures, cleanup actions).
 */

import fs from 'fs';
import path from 'path';
import { getLogDir, getErrorReportingConfig } from './config.js';
import type { FaultLevel } from './config-types.js';

export type { FaultLevel } from './config-types.js';

export interface FaultEntry {
  timestamp: string;
  level: FaultLevel;
  component: string;
  message: string;
  stack?: string;
  context?: Record<string, unknown>;
}

export const FAULT_LOG_NAME = 'featwise-faults.log';

const LEVEL_ORDER: Record<FaultLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function rotateIfNeeded(logPath: string, maxSizeMb: number): void {
  if (!fs.existsSync(logPath)) return;
  if (fs.statSync(logPath).size > maxSizeMb * 1024 * 1024) {
    fs.renameSync(logPath, logPath + '.1');
  }
}

// Set after the first failed write; later faults skip the file
let fileUnavailable = false;

function writeToFile(entry: FaultEntry, maxSizeMb: number): void {
  if (fileUnavailable) return;
  try {
    const logDir = getLogDir();
    const logPath = path.join(logDir, FAULT_LOG_NAME);

    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    rotateIfNeeded(logPath, maxSizeMb);
    fs.appendFileSync(logPath, JSON.stringify(entry) + '\n');
  } catch (error) {
    fileUnavailable = true;
    process.stderr.write(`featwise: fault log disabled: ${error instanceof Error ? error.message : String(error)}\n`);
  }
}

/**
 * Log a fault. Never throws.
 */
export function logFault(
  level: FaultLevel,
  component: string,
  message: string,
  opts?: { error?: Error; context?: Record<string, unknown> }
): void {
  const config = getErrorReportingConfig();
  if (!config.enabled) return;
  if (LEVEL_ORDER[level] < LEVEL_ORDER[config.level]) return;

  writeToFile(
    {
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      stack: opts?.error?.stack,
      context: opts?.context,
    },
    config.max_file_size_mb
  );
}

/** Log an error (convenience wrapper). */
export function logError(
  component: string,
  message: string,
  error?: Error,
  context?: Record<string, unknown>
): void {
  logFault('error', component, message, { error, context });
}

/** Log a warning (convenience wrapper). */
export function logWarn(component: string, message: string, context?: Record<string, unknown>): void {
  logFault('warn', component, message, { context });
}

/** Log an info message (convenience wrapper). */
export function logInfo(component: string, message: string, context?: Record<string, unknown>): void {
  logFault('info', component, message, { context });
}
