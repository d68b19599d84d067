import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { FAULT_LOG_NAME, logError, logFault, logInfo, logWarn } from './fault-logger.js';
import type { FaultEntry } from './fault-logger.js';
import type { ErrorReportingConfig } from './config-types.js';

const state = vi.hoisted(() => {
  const config: ErrorReportingConfig = { enabled: true, level: 'warn', max_file_size_mb: 5 };
  return { logDir: '', config };
});

vi.mock('./config.js', () => ({
  getLogDir: () => state.logDir,
  getErrorReportingConfig: () => ({ ...state.config }),
}));

describe('fault-logger', () => {
  let logPath: string;

  function entries(): FaultEntry[] {
    return fs
      .readFileSync(logPath, 'utf-8')
      .trim()
      .split('\n')
      .map((line): FaultEntry => JSON.parse(line));
  }

  beforeEach(() => {
    state.logDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'featwise-faults-')), 'logs');
    state.config = { enabled: true, level: 'warn', max_file_size_mb: 5 };
    logPath = path.join(state.logDir, FAULT_LOG_NAME);
  });

  afterEach(() => {
    fs.rmSync(path.dirname(state.logDir), { recursive: true, force: true });
  });

  it('writes one JSON line per fault, creating the log directory', () => {
    logFault('error', 'session', 'engine crashed', { context: { designPath: '/out/cope1_design.fsf' } });

    const [entry] = entries();
    expect(entry?.level).toBe('error');
    expect(entry?.component).toBe('session');
    expect(entry?.message).toBe('engine crashed');
    expect(entry?.context).toEqual({ designPath: '/out/cope1_design.fsf' });
    expect(entry?.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it('records the stack of an error', () => {
    logError('cli', 'command failed', new Error('boom'));

    expect(entries()[0]?.stack).toContain('Error: boom');
  });

  it('drops entries below the configured level', () => {
    logInfo('artifacts', 'removed design');
    logFault('debug', 'artifacts', 'details');

    expect(fs.existsSync(logPath)).toBe(false);
  });

  it('writes info entries once the level allows them', () => {
    state.config.level = 'info';
    logInfo('artifacts', 'removed design');

    expect(entries().map((e) => e.message)).toEqual(['removed design']);
  });

  it('writes nothing when disabled', () => {
    state.config.enabled = false;
    logWarn('config', 'bad value');

    expect(fs.existsSync(logPath)).toBe(false);
  });

  it('appends in order', () => {
    logWarn('config', 'first');
    logError('cli', 'second');

    expect(entries().map((e) => [e.level, e.message])).toEqual([
      ['warn', 'first'],
      ['error', 'second'],
    ]);
  });

  it('rotates an oversized log to .1', () => {
    state.config.max_file_size_mb = 0.0001;
    logWarn('test', 'a'.repeat(200));
    logWarn('test', 'after rotation');

    expect(fs.existsSync(`${logPath}.1`)).toBe(true);
    expect(entries().map((e) => e.message)).toEqual(['after rotation']);
  });

  // Runs last: after a failed write the file channel stays off for the module
  it('reports once on stderr when the log cannot be written', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    fs.writeFileSync(state.logDir, 'not a directory');

    expect(() => logError('cli', 'first')).not.toThrow();
    logError('cli', 'second');

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr).toHaveBeenCalledWith(expect.stringMatching(/^featwise: fault log disabled: /));
    stderr.mockRestore();
  });
});
