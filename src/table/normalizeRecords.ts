import { isAssayPipelineError } from '../errors/AssayPipelineError.js';
import { coerceNumeric, normalizeBarcode, parseLocation, pgToFg } from '../normalize/fields.js';
import type { BarcodeMode, RawRecord, RowErrorPolicy, RowIssue, SampleRow } from '../types/assay.js';
import { RowTable } from './RowTable.js';

export interface NormalizeOptions {
  /** Barcode conversion mode (default: 'strict') */
  barcodeMode?: BarcodeMode;
  /** Skip and report failing records, or rethrow the first failure (default: 'skip') */
  onRowError?: RowErrorPolicy;
}

export interface NormalizeResult {
  table: RowTable;
  issues: RowIssue[];
}

export function normalizeRecord(record: RawRecord, barcodeMode: BarcodeMode = 'strict'): SampleRow {
  const location = parseLocation(record.Location);
  const concentrationPgMl = coerceNumeric(record.Concentration);
  return {
    sampleBarcode: normalizeBarcode(record['Sample Barcode'], barcodeMode),
    location: record.Location,
    ...location,
    sampleType: record['Sample Type'],
    batchName: record['Batch Name'],
    aeb: coerceNumeric(record.AEB),
    concentrationPgMl,
    concentrationFgMl: pgToFg(concentrationPgMl),
    flags: record.Flags,
  };
}

/**
 * Run every record through the field normalizer and collect the result
 * into a RowTable.
 */
export function normalizeRecords(records: readonly RawRecord[], options: NormalizeOptions = {}): NormalizeResult {
  const barcodeMode = options.barcodeMode ?? 'strict';
  const onRowError = options.onRowError ?? 'skip';
  const rows: SampleRow[] = [];
  const issues: RowIssue[] = [];

  records.forEach((record, index) => {
    try {
      rows.push(normalizeRecord(record, barcodeMode));
    } catch (err) {
      if (onRowError === 'throw' || !isAssayPipelineError(err)) {
        throw err;
      }
      issues.push({ index, code: err.code, message: err.message });
    }
  });

  if (issues.length > 0) {
    console.warn(`Skipped ${issues.length} of ${records.length} records during normalization`);
  }

  return { table: new RowTable(rows), issues };
}
