import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { setDatasetRoot } from './lib/config.js';
import { runEngine } from './lib/analysis/engine.js';
import { makeFeatDir, makeGfeatDir, makeTempDir } from './lib/analysis/test-dataset.js';
import { installTemplates } from './commands/init.js';
import { fixedEffects } from './commands/fixed-effects.js';
import { mixedEffects } from './commands/mixed-effects.js';

vi.mock('./lib/analysis/engine.js', () => ({ runEngine: vi.fn() }));

vi.mock('ora', () => ({
  default: vi.fn(() => {
    const spinner = { start: vi.fn(), succeed: vi.fn(), fail: vi.fn() };
    spinner.start.mockReturnValue(spinner);
    return spinner;
  }),
}));

vi.mock('./lib/fault-logger.js', () => ({
  logError: vi.fn(),
  logWarn: vi.fn(),
  logInfo: vi.fn(),
}));

/**
 * Both analysis stages over a throwaway dataset, non-interactively, with an
 * engine stand-in that writes the `.gfeat` layout FEAT would.
 */
describe('fixed effects then mixed effects', () => {
  let dataset: string;
  let level1: string;
  let level2: string;
  let level3: string;
  const designs = new Map<string, string[]>();
  const original = { stdin: process.stdin.isTTY, stdout: process.stdout.isTTY };

  function run(subject: string, n: number): string {
    return path.join(level1, subject, 'ses-01', 'func', `${subject}_ses-01_task-nback_run-0${n}.feat`);
  }

  beforeAll(async () => {
    dataset = makeTempDir();
    level1 = path.join(dataset, 'derivatives', 'fsl', 'level-1', 'nback_analysis');
    level2 = path.join(dataset, 'derivatives', 'fsl', 'level-2', 'nback_analysis');
    level3 = path.join(dataset, 'derivatives', 'fsl', 'level-3');

    const runCopes: Record<string, number[]> = {
      'sub-01': [3, 3, 3, 2],
      'sub-02': [3, 3],
      'sub-03': [3, 3],
    };
    for (const [subject, counts] of Object.entries(runCopes)) {
      counts.forEach((count, i) => makeFeatDir(path.dirname(run(subject, i + 1)), path.basename(run(subject, i + 1)), count));
    }
    const image = path.join(dataset, 'derivatives', 'templates', 'MNI152_T1_2mm_brain.nii.gz');
    fs.mkdirSync(path.dirname(image), { recursive: true });
    fs.writeFileSync(image, '');

    Object.defineProperty(process.stdin, 'isTTY', { value: false, configurable: true });
    Object.defineProperty(process.stdout, 'isTTY', { value: false, configurable: true });
    vi.spyOn(os, 'homedir').mockReturnValue(path.join(dataset, 'home'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    setDatasetRoot(dataset);
    installTemplates(false);

    vi.mocked(runEngine).mockImplementation(async (_command, designPath) => {
      designs.set(designPath, fs.readFileSync(designPath, 'utf-8').split('\n'));
      if (path.basename(designPath) === 'modified_fixed-effects_design.fsf') {
        makeGfeatDir(path.dirname(path.dirname(designPath)), `${path.basename(path.dirname(designPath))}.gfeat`, 3);
      }
      return { designPath, exitCode: 0, output: '', durationMs: 10 };
    });

    await fixedEffects({ select: '', yes: true });
    await mixedEffects({ yes: true });
  });

  afterAll(() => {
    Object.defineProperty(process.stdin, 'isTTY', { value: original.stdin, configurable: true });
    Object.defineProperty(process.stdout, 'isTTY', { value: original.stdout, configurable: true });
    setDatasetRoot(null);
    vi.restoreAllMocks();
    fs.rmSync(dataset, { recursive: true, force: true });
  });

  const fixedDesign = (subject: string): string =>
    path.join(level2, subject, 'ses-01', `${subject}_ses-01_desc-fixed-effects`, 'modified_fixed-effects_design.fsf');

  it('runs the engine once per subject-session and once per shared cope', () => {
    expect(vi.mocked(runEngine).mock.calls.map((call) => call[1])).toEqual([
      fixedDesign('sub-01'),
      fixedDesign('sub-02'),
      fixedDesign('sub-03'),
      path.join(level3, 'desc-group', 'cope1_design.fsf'),
      path.join(level3, 'desc-group', 'cope2_design.fsf'),
      path.join(level3, 'desc-group', 'cope3_design.fsf'),
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it('feeds only the majority runs into fixed effects', () => {
    const lines = designs.get(fixedDesign('sub-01')) ?? [];

    expect(lines.filter((l) => l.startsWith('set feat_files('))).toEqual([
      `set feat_files(1) "${run('sub-01', 1)}"`,
      `set feat_files(2) "${run('sub-01', 2)}"`,
      `set feat_files(3) "${run('sub-01', 3)}"`,
    ]);
    expect(lines).toContain('set fmri(multiple) 3');
    expect(lines).toContain('set fmri(ncopeinputs) 3');
    expect(lines).toContain('set fmri(copeinput.3) 1');
  });

  it('builds one group design per cope over every subject', () => {
    const lines = designs.get(path.join(level3, 'desc-group', 'cope2_design.fsf')) ?? [];
    const cope = (subject: string): string =>
      path.join(level2, subject, 'ses-01', `${subject}_ses-01_desc-fixed-effects.gfeat`, 'cope2.feat', 'stats', 'cope1.nii.gz');

    expect(lines.filter((l) => l.startsWith('set feat_files('))).toEqual([
      `set feat_files(1) "${cope('sub-01')}"`,
      `set feat_files(2) "${cope('sub-02')}"`,
      `set feat_files(3) "${cope('sub-03')}"`,
    ]);
    expect(lines).toContain(`set fmri(outputdir) "${path.join(level3, 'desc-group', 'cope2')}"`);
    expect(lines).toContain('set fmri(ncopeinputs) 1');
    expect(lines.filter((l) => l.startsWith('set fmri(groupmem.'))).toHaveLength(3);
  });

  it('leaves no design files behind', () => {
    for (const designPath of designs.keys()) {
      expect(fs.existsSync(designPath)).toBe(false);
    }
    expect(fs.existsSync(path.join(level2, 'sub-01', 'ses-01', 'sub-01_ses-01_desc-fixed-effects'))).toBe(false);
  });
});
