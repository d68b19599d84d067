/**
 * Mixed-effects (third-level, FLAME 1) planning: one design per shared cope.
 */

import fs from 'fs';
import path from 'path';
import type { ContrastPlan } from './types.js';
import type { DesignJob } from './session.js';

/** `[task-<task>_]desc-[<desc>_]group` */
export function groupOutputDirName(task?: string, desc?: string): string {
  const prefix = task ? `task-${task}_` : '';
  const descriptor = desc ? `${desc}_` : '';
  return `${prefix}desc-${descriptor}group`;
}

export function mixedEffectsDesignPath(outputDir: string, contrast: number): string {
  return path.join(outputDir, `cope${contrast}_design.fsf`);
}

export interface MixedEffectsSettings {
  /** `<level-3>/<group dir name>` */
  outputDir: string;
  templatePath: string;
  standardImage: string;
  zThreshold: string;
  clusterPThreshold: string;
  outputExists?: (gfeatPath: string) => boolean;
}

export type MixedEffectsPlanItem =
  | { contrast: number; status: 'exists'; engineOutput: string }
  | { contrast: number; status: 'ready'; job: DesignJob };

function defaultOutputExists(gfeatPath: string): boolean {
  return fs.existsSync(gfeatPath) && fs.statSync(gfeatPath).isDirectory();
}

export function mixedEffectsJob(plan: ContrastPlan, settings: MixedEffectsSettings): DesignJob {
  const copeOutput = path.join(settings.outputDir, `cope${plan.contrast}`);
  const designPath = mixedEffectsDesignPath(settings.outputDir, plan.contrast);
  return {
    label: `cope${plan.contrast}`,
    templatePath: settings.templatePath,
    designPath,
    cleanupPath: designPath,
    engineOutput: `${copeOutput}.gfeat`,
    spec: {
      outputDir: copeOutput,
      standardImage: settings.standardImage,
      zThreshold: settings.zThreshold,
      clusterPThreshold: settings.clusterPThreshold,
      inputs: plan.inputs.map((i) => i.file),
      // Each input is a single 3D cope image
      copeCount: 1,
    },
  };
}

export function planMixedEffects(plans: ContrastPlan[], settings: MixedEffectsSettings): MixedEffectsPlanItem[] {
  const outputExists = settings.outputExists ?? defaultOutputExists;
  return plans.map((plan): MixedEffectsPlanItem => {
    const job = mixedEffectsJob(plan, settings);
    if (outputExists(job.engineOutput)) {
      return { contrast: plan.contrast, status: 'exists', engineOutput: job.engineOutput };
    }
    return { contrast: plan.contrast, status: 'ready', job };
  });
}
