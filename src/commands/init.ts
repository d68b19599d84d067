/**
 * featwise init: install the bundled design templates into the dataset.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { getConfig, getDatasetRoot, getResolvedPaths } from '../lib/config.js';
import { NotFoundError } from '../lib/errors.js';
import { logInfo } from '../lib/fault-logger.js';
import { handleCommandError } from './command-utils.js';

// Get the directory where featwise is installed (src/commands or dist/commands)
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const PACKAGE_DIR = path.resolve(__dirname, '..', '..');

export const BUNDLED_TEMPLATES_DIR = path.join(PACKAGE_DIR, 'templates');

interface InitOptions {
  force?: boolean;
}

export interface InstalledTemplate {
  source: string;
  target: string;
  status: 'created' | 'overwritten' | 'kept';
}

/** Copy both bundled templates to the configured template paths. */
export function installTemplates(force: boolean, bundledDir: string = BUNDLED_TEMPLATES_DIR): InstalledTemplate[] {
  const paths = getResolvedPaths();
  const pairs: Array<[string, string]> = [
    [path.join(bundledDir, 'fixed-effects_design.fsf'), paths.fixed_effects_template],
    [path.join(bundledDir, 'mixed-effects_design.fsf'), paths.mixed_effects_template],
  ];

  return pairs.map(([source, target]): InstalledTemplate => {
    if (!fs.existsSync(source)) {
      throw new NotFoundError(`Bundled template missing: ${source}`);
    }
    const exists = fs.existsSync(target);
    if (exists && !force) {
      return { source, target, status: 'kept' };
    }
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.copyFileSync(source, target);
    logInfo('init', `Installed ${path.basename(source)} at ${target}`);
    return { source, target, status: exists ? 'overwritten' : 'created' };
  });
}

export async function init(options: InitOptions = {}): Promise<void> {
  try {
    const root = getDatasetRoot();
    console.log(`Dataset root: ${root}\n`);

    for (const t of installTemplates(options.force ?? false)) {
      const note = t.status === 'kept' ? 'exists, kept (use --force to overwrite)' : t.status;
      console.log(`  ${path.relative(root, t.target) || t.target}: ${note}`);
    }

    const { standard_image } = getResolvedPaths();
    if (!fs.existsSync(standard_image)) {
      console.log(`\nNote: standard-space image not found at ${standard_image}`);
      console.log(`Set paths.standard_image in ${path.join(root, 'code', 'featwise.json')} or copy the image there.`);
    }
    console.log(`\nEngine command: ${getConfig().engine.command}`);
  } catch (error) {
    handleCommandError(error, 'init');
  }
}
