import { z } from 'zod';
import { AssayPipelineError } from '../errors/AssayPipelineError.js';
import { isColumnNumber, isRowLetter } from '../normalize/fields.js';
import type { ColumnNumber, RowLetter, TemplateLabel } from '../types/assay.js';
import type { Template, TemplateSet } from './types.js';

/**
 * Template as supplied externally: an `Axis` entry plus coordinate → label
 * entries, e.g. `{ Axis: 'Column', '1': 'FeederOne', '7': 'FeederTwo' }`.
 */
export const TemplateWireSchema = z
  .object({
    Axis: z.enum(['Row', 'Column']),
  })
  .catchall(z.union([z.string(), z.number()]));

export type TemplateWire = z.infer<typeof TemplateWireSchema>;

export const TemplateSetWireSchema = z.object({
  dilution: z.unknown(),
  feeders: z.unknown(),
  replicate: z.unknown(),
});

const COLUMN_KEY = /^\d{1,2}$/;

function invalidTemplate(message: string, details?: Record<string, unknown>): AssayPipelineError {
  return new AssayPipelineError('INVALID_TEMPLATE', message, details);
}

function assignmentEntries(wire: TemplateWire): Array<[string, TemplateLabel]> {
  return Object.entries(wire).filter(([key]) => key !== 'Axis');
}

/**
 * Convert the external template form into a tagged Template.
 *
 * @param label - names the template in error messages
 * @throws AssayPipelineError INVALID_TEMPLATE on a missing or unknown axis,
 *   or a key that does not address the declared axis
 */
export function parseTemplate(input: unknown, label = 'template'): Template {
  const parsed = TemplateWireSchema.safeParse(input);
  if (!parsed.success) {
    throw invalidTemplate(`Invalid ${label}: ${parsed.error.issues.map((i) => i.message).join('; ')}`, {
      issues: parsed.error.issues,
    });
  }
  const wire = parsed.data;

  if (wire.Axis === 'Row') {
    const assignments = new Map<RowLetter, TemplateLabel>();
    for (const [key, value] of assignmentEntries(wire)) {
      if (!isRowLetter(key)) {
        throw invalidTemplate(`Invalid ${label}: key "${key}" is not a plate row (A-H)`, { key });
      }
      assignments.set(key, value);
    }
    return { axis: 'row', assignments };
  }

  const assignments = new Map<ColumnNumber, TemplateLabel>();
  for (const [key, value] of assignmentEntries(wire)) {
    const column = Number.parseInt(key, 10);
    if (!COLUMN_KEY.test(key) || !isColumnNumber(column)) {
      throw invalidTemplate(`Invalid ${label}: key "${key}" is not a plate column (1-12)`, { key });
    }
    assignments.set(column, value);
  }
  return { axis: 'column', assignments };
}

export function parseTemplateSet(input: unknown): TemplateSet {
  const parsed = TemplateSetWireSchema.safeParse(input);
  if (!parsed.success) {
    throw invalidTemplate('Template set must be an object with dilution, feeders and replicate', {
      issues: parsed.error.issues,
    });
  }
  return {
    dilution: parseTemplate(parsed.data.dilution, 'dilution template'),
    feeders: parseTemplate(parsed.data.feeders, 'feeder template'),
    replicate: parseTemplate(parsed.data.replicate, 'replicate template'),
  };
}
