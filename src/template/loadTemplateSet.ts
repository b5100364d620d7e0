import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { parseTemplateSet } from './parseTemplate.js';
import type { TemplateSet } from './types.js';

/**
 * Load dilution, feeder and replicate templates from a YAML file:
 *
 * ```yaml
 * dilution:
 *   Axis: Row
 *   A: 1
 *   B: 10
 * feeders:
 *   Axis: Column
 *   1: FeederOne
 * replicate:
 *   Axis: Column
 *   1: 1
 * ```
 */
export async function loadTemplateSet(path: string): Promise<TemplateSet> {
  const content = await readFile(resolve(path), 'utf-8');
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse template file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseTemplateSet(parsed);
}
