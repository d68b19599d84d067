/**
 * Config Generator
 *
 * Materialises a FEAT `.fsf` design from a template. Scalar placeholders
 * (`@NAME@`) are replaced literally; sentinel lines expand into one stanza
 * per input. The template file itself is never modified.
 */

import fs from 'fs';
import path from 'path';
import type { DesignSpec } from './types.js';
import { ConfigError } from '../errors.js';

export const BLOCK_SENTINELS = {
  featFiles: '@FEAT_FILES@',
  evgValues: '@EVG_VALUES@',
  groupMembership: '@GROUP_MEMBERSHIP@',
  copeInputs: '@COPEINPUTS@',
} as const;

const SCALAR_RE = /@(OUTPUT_DIR|TEMPLATE|NPTS|COPE_COUNT|Z_THRESHOLD|CLUSTER_P_THRESHOLD)@/g;
const MULTIPLE_RE = /^set fmri\(multiple\)\s/;
const NCOPEINPUTS_RE = /^set fmri\(ncopeinputs\)\s/;

/** Escape a value for use inside a double-quoted Tcl string. */
export function escapeFsfString(value: string): string {
  return value.replace(/["\\]/g, (ch) => `\\${ch}`);
}

function numbered(count: number, stanza: (i: number) => string[]): string[] {
  const lines: string[] = [];
  for (let i = 1; i <= count; i++) {
    lines.push(...stanza(i), '');
  }
  return lines;
}

export function featFilesBlock(inputs: string[]): string[] {
  return numbered(inputs.length, (i) => [
    `# 4D AVW data or FEAT directory (${i})`,
    `set feat_files(${i}) "${escapeFsfString(inputs[i - 1])}"`,
  ]);
}

export function evgValuesBlock(count: number): string[] {
  return numbered(count, (i) => [`# Higher-level EV value for EV 1 and input ${i}`, `set fmri(evg${i}.1) 1`]);
}

export function groupMembershipBlock(count: number): string[] {
  return numbered(count, (i) => [`# Group membership for input ${i}`, `set fmri(groupmem.${i}) 1`]);
}

export function copeInputsBlock(count: number): string[] {
  return numbered(count, (i) => [`# Use lower-level cope ${i} for higher-level analysis`, `set fmri(copeinput.${i}) 1`]);
}

/**
 * Render a design from template text.
 *
 * `fmri(multiple)` and `fmri(ncopeinputs)` are always rewritten to the real
 * input and cope counts. A per-input block whose sentinel is missing from the
 * template is appended at the end instead.
 */
export function renderDesign(template: string, spec: DesignSpec): string {
  const n = spec.inputs.length;
  const scalars: Record<string, string> = {
    // Both land inside double quotes in the template
    OUTPUT_DIR: escapeFsfString(spec.outputDir),
    TEMPLATE: escapeFsfString(spec.standardImage),
    NPTS: String(n),
    COPE_COUNT: String(spec.copeCount),
    Z_THRESHOLD: spec.zThreshold,
    CLUSTER_P_THRESHOLD: spec.clusterPThreshold,
  };

  const blocks: Record<string, () => string[]> = {
    [BLOCK_SENTINELS.featFiles]: () => featFilesBlock(spec.inputs),
    [BLOCK_SENTINELS.evgValues]: () => evgValuesBlock(n),
    [BLOCK_SENTINELS.groupMembership]: () => groupMembershipBlock(n),
    [BLOCK_SENTINELS.copeInputs]: () => copeInputsBlock(spec.copeCount),
  };

  const expanded = new Set<string>();
  const out: string[] = [];

  for (const raw of template.split(/\r?\n/)) {
    // Single pass with a replacer function: values are inserted verbatim
    const line = raw.replace(SCALAR_RE, (_match, name: string) => scalars[name] ?? _match);
    const sentinel = line.trim();

    if (MULTIPLE_RE.test(line)) {
      out.push(`set fmri(multiple) ${n}`);
    } else if (NCOPEINPUTS_RE.test(line)) {
      out.push(`set fmri(ncopeinputs) ${spec.copeCount}`);
    } else if (Object.hasOwn(blocks, sentinel)) {
      out.push(...blocks[sentinel]());
      expanded.add(sentinel);
    } else {
      out.push(line);
    }
  }

  for (const sentinel of [BLOCK_SENTINELS.featFiles, BLOCK_SENTINELS.evgValues, BLOCK_SENTINELS.groupMembership]) {
    if (!expanded.has(sentinel)) {
      out.push(...blocks[sentinel]());
    }
  }

  const text = out.join('\n');
  return text.endsWith('\n') ? text : text + '\n';
}

/**
 * Fail before anything is written when the template or the standard-space
 * image is missing.
 */
export function assertDesignInputs(templatePath: string, standardImage: string): void {
  if (!fs.existsSync(templatePath)) {
    throw new ConfigError(`Design template not found at ${templatePath}`, { templatePath });
  }
  if (!fs.existsSync(standardImage)) {
    throw new ConfigError(`Standard-space template image not found at ${standardImage}`, { standardImage });
  }
}

/** Render `templatePath` with `spec` into a new file at `designPath`. */
export function writeDesign(templatePath: string, designPath: string, spec: DesignSpec): void {
  assertDesignInputs(templatePath, spec.standardImage);
  const template = fs.readFileSync(templatePath, 'utf-8');
  fs.mkdirSync(path.dirname(designPath), { recursive: true });
  fs.writeFileSync(designPath, renderDesign(template, spec));
}
