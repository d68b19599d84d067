import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import { CancelledError } from '../errors.js';
import { ArtifactScope } from './artifacts.js';
import { makeTempDir } from './test-dataset.js';

vi.mock('../fault-logger.js', () => ({
  logInfo: vi.fn(),
  logWarn: vi.fn(),
}));

describe('ArtifactScope', () => {
  let tempDir: string;
  let scope: ArtifactScope;

  beforeEach(() => {
    tempDir = makeTempDir();
    scope = new ArtifactScope();
  });

  afterEach(() => {
    scope.dispose();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function artifact(name: string): string {
    const p = path.join(tempDir, name);
    fs.mkdirSync(path.dirname(p), { recursive: true });
    fs.writeFileSync(p, 'design');
    return p;
  }

  it('dispose removes every registered file and directory', () => {
    const file = artifact('cope1_design.fsf');
    const dir = path.dirname(artifact('sub-01_ses-01/modified_fixed-effects_design.fsf'));
    scope.register(file, 'cope1');
    scope.register(dir, 'sub-01 ses-01');

    expect(scope.dispose()).toEqual([]);
    expect(fs.existsSync(file)).toBe(false);
    expect(fs.existsSync(dir)).toBe(false);
    expect(scope.size).toBe(0);
  });

  it('dispose prunes a registered directory only when it holds no files', () => {
    const emptyRoot = path.join(tempDir, 'level-3', 'nback');
    fs.mkdirSync(path.join(emptyRoot, 'ses-01'), { recursive: true });
    const keptRoot = path.join(tempDir, 'level-2');
    artifact('level-2/sub-01/ses-01/fixed.gfeat/report.html');
    fs.mkdirSync(path.join(keptRoot, 'sub-02'), { recursive: true });
    scope.registerDirectory(emptyRoot, 'output directory');
    scope.registerDirectory(keptRoot, 'output directory');

    expect(scope.dispose()).toEqual([]);
    expect(fs.existsSync(emptyRoot)).toBe(false);
    expect(fs.existsSync(path.join(tempDir, 'level-3'))).toBe(true);
    expect(fs.existsSync(path.join(keptRoot, 'sub-01', 'ses-01', 'fixed.gfeat', 'report.html'))).toBe(true);
    expect(fs.existsSync(path.join(keptRoot, 'sub-02'))).toBe(false);
  });

  it('release removes one artifact and stops tracking it', () => {
    const first = artifact('a.fsf');
    const second = artifact('b.fsf');
    scope.register(first, 'a');
    scope.register(second, 'b');

    expect(scope.release(first)).toBe(true);

    expect(fs.existsSync(first)).toBe(false);
    expect(fs.existsSync(second)).toBe(true);
    expect(scope.pending()).toEqual([second]);
  });

  it('release of an unknown path is a no-op', () => {
    expect(scope.release(path.join(tempDir, 'never-registered'))).toBe(true);
  });

  it('arm and disarm manage a single SIGINT listener', () => {
    const before = process.listenerCount('SIGINT');

    scope.arm();
    scope.arm();
    expect(process.listenerCount('SIGINT')).toBe(before + 1);
    expect(scope.isArmed).toBe(true);

    scope.disarm();
    expect(process.listenerCount('SIGINT')).toBe(before);
  });

  it('dispose disarms', () => {
    const before = process.listenerCount('SIGINT');
    scope.arm();

    scope.dispose();

    expect(process.listenerCount('SIGINT')).toBe(before);
    expect(scope.isArmed).toBe(false);
  });

  it('SIGINT while armed aborts instead of exiting', () => {
    scope.arm();
    const listener = process.listeners('SIGINT').at(-1);
    listener?.('SIGINT');

    expect(scope.signal.aborted).toBe(true);
    expect(() => scope.throwIfAborted()).toThrow(
      expect.objectContaining({ name: 'CancelledError', message: 'Interrupted by user' })
    );
  });

  it('throwIfAborted is silent until aborted', () => {
    expect(() => scope.throwIfAborted()).not.toThrow();
  });
});
