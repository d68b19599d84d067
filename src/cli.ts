#!/usr/bin/env node

import { Command } from 'commander';
import { setDatasetRoot } from './lib/config.js';
import { fixedEffects } from './commands/fixed-effects.js';
import { mixedEffects } from './commands/mixed-effects.js';
import { scan } from './commands/scan.js';
import { design } from './commands/design.js';
import { init } from './commands/init.js';
import { showConfig } from './commands/config.js';

const VERSION = '0.3.0';

const program = new Command();

program
  .name('featwise')
  .description('Higher-level FSL FEAT analyses (fixed and mixed effects) over a BIDS dataset')
  .version(VERSION)
  .option('-b, --base-dir <dir>', 'Dataset root (default: FEATWISE_BASE_DIR or auto-detected)')
  .hook('preAction', (thisCommand) => {
    const { baseDir } = thisCommand.opts<{ baseDir?: string }>();
    if (baseDir) setDatasetRoot(baseDir);
  });

program
  .command('fixed-effects')
  .alias('second-level')
  .description('Second-level fixed effects across the runs of each subject-session')
  .option('-a, --analysis <name>', 'Level-1 analysis directory name')
  .option('-s, --select <tokens>', "Selection, e.g. 'sub-01:ses-01:1,2 -sub-03' ('' for all)")
  .option('-t, --task <name>', 'Task label added to output names')
  .option('-z, --z-threshold <z>', 'Cluster-forming Z threshold')
  .option('-p, --cluster-p <p>', 'Cluster P threshold')
  .option('-y, --yes', 'Run without asking for confirmation')
  .option('--on-engine-failure <policy>', 'abort | continue')
  .action(fixedEffects);

program
  .command('mixed-effects')
  .alias('third-level')
  .description('Third-level FLAME 1 mixed effects, one analysis per shared cope')
  .option('-a, --analysis <name>', 'Level-2 analysis directory name')
  .option('--session <name>', 'Session to analyse')
  .option('-x, --exclude <subjects...>', 'Subjects to leave out')
  .option('-t, --task <name>', 'Task label for the group output folder')
  .option('-d, --desc <label>', 'Descriptor for the group output folder')
  .option('-z, --z-threshold <z>', 'Cluster-forming Z threshold')
  .option('-p, --cluster-p <p>', 'Cluster P threshold')
  .option('-y, --yes', 'Run without asking for confirmation')
  .option('--on-engine-failure <policy>', 'abort | continue')
  .action(mixedEffects);

program
  .command('scan')
  .description('Report level-1 analyses and cope-count reconciliation per subject-session')
  .option('-a, --analysis <name>', 'Only this level-1 analysis')
  .action(scan);

program
  .command('design <output-path> <feat-dirs...>')
  .description('Write a fixed-effects design file for the given FEAT directories')
  .option('-c, --copes <n>', 'Number of lower-level copes (default: agreed by the inputs)')
  .option('-z, --z-threshold <z>', 'Cluster-forming Z threshold')
  .option('-p, --cluster-p <p>', 'Cluster P threshold')
  .action(design);

program
  .command('init')
  .description('Install the default design templates into code/design_files')
  .option('-f, --force', 'Overwrite existing templates')
  .action(init);

program
  .command('config')
  .description('Show the resolved configuration')
  .option('--json', 'Output as JSON')
  .action(showConfig);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
