import type { ColumnNumber, RowLetter, TemplateLabel } from '../types/assay.js';

export type TemplateAxis = 'row' | 'column';

/**
 * Experiment-design layout keyed by either plate rows or plate columns.
 * Coordinates without an entry resolve to `unassigned`.
 */
export type Template =
  | { axis: 'row'; assignments: ReadonlyMap<RowLetter, TemplateLabel> }
  | { axis: 'column'; assignments: ReadonlyMap<ColumnNumber, TemplateLabel> };

/**
 * The three layouts applied to a plate together.
 */
export interface TemplateSet {
  dilution: Template;
  feeders: Template;
  replicate: Template;
}

export function rowTemplate(entries: ReadonlyArray<readonly [RowLetter, TemplateLabel]>): Template {
  return { axis: 'row', assignments: new Map(entries) };
}

export function columnTemplate(entries: ReadonlyArray<readonly [ColumnNumber, TemplateLabel]>): Template {
  return { axis: 'column', assignments: new Map(entries) };
}
