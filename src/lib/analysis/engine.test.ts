import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ChildProcess } from 'child_process';
import { PassThrough } from 'stream';
import spawn from 'cross-spawn';
import { CancelledError, ConfigError, EngineError } from '../errors.js';
import { runEngine, splitCommand } from './engine.js';

vi.mock('cross-spawn', () => ({ default: vi.fn() }));

function fakeChild(): ChildProcess {
  const child = new ChildProcess();
  child.stdout = new PassThrough();
  child.stderr = new PassThrough();
  vi.spyOn(child, 'kill').mockReturnValue(true);
  return child;
}

describe('splitCommand', () => {
  it('splits program from arguments', () => {
    expect(splitCommand('  fsl_sub -q short.q   feat ')).toEqual({
      program: 'fsl_sub',
      args: ['-q', 'short.q', 'feat'],
    });
  });

  it('rejects an empty command', () => {
    expect(() => splitCommand('   ')).toThrow(ConfigError);
  });
});

describe('runEngine', () => {
  let child: ChildProcess;

  beforeEach(() => {
    vi.mocked(spawn).mockReset();
    child = fakeChild();
    vi.mocked(spawn).mockReturnValue(child);
  });

  it('passes the design file as the last argument', async () => {
    const pending = runEngine('fsl_sub feat', '/out/design.fsf', { cwd: '/data' });
    child.emit('close', 0);
    await pending;

    expect(spawn).toHaveBeenCalledWith('fsl_sub', ['feat', '/out/design.fsf'], {
      cwd: '/data',
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });
  });

  it('resolves with the exit code and captured output', async () => {
    const pending = runEngine('feat', '/out/design.fsf');
    child.stdout?.emit('data', Buffer.from('Started\n'));
    child.stderr?.emit('data', Buffer.from('warning\n'));
    child.emit('close', 3);

    const result = await pending;
    expect(result.designPath).toBe('/out/design.fsf');
    expect(result.exitCode).toBe(3);
    expect(result.output).toBe('Started\nwarning\n');
  });

  it('rejects with EngineError when the program cannot start', async () => {
    const pending = runEngine('feat', '/out/design.fsf');
    child.emit('error', new Error('spawn feat ENOENT'));

    await expect(pending).rejects.toThrow(
      expect.objectContaining({ name: 'EngineError', message: 'Could not start feat: spawn feat ENOENT', exitCode: null })
    );
  });

  it('kills the engine and rejects with the abort reason', async () => {
    const controller = new AbortController();
    const pending = runEngine('feat', '/out/design.fsf', { signal: controller.signal });
    const reason = new CancelledError('Interrupted by user');
    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
    expect(child.kill).toHaveBeenCalledWith('SIGTERM');
  });

  it('does not start when already aborted', async () => {
    const controller = new AbortController();
    const reason = new CancelledError();
    controller.abort(reason);

    await expect(runEngine('feat', '/out/design.fsf', { signal: controller.signal })).rejects.toBe(reason);
    expect(spawn).not.toHaveBeenCalled();
  });
});
