import { partitionBatches } from '../batch/partition.js';
import type { Batch } from '../batch/Batch.js';
import type { AppConfig } from '../config/types.js';
import { readRawTable } from '../ingest/readRawTable.js';
import { normalizeRecords } from '../table/normalizeRecords.js';
import type { TemplateSet } from '../template/types.js';
import type { BarcodeMode, RawRecord, RowErrorPolicy, RowIssue } from '../types/assay.js';

export interface ProcessOptions {
  barcodeMode?: BarcodeMode;
  onRowError?: RowErrorPolicy;
  /** Applied to every plate of every batch */
  templates?: TemplateSet;
}

export interface ProcessExportOptions extends ProcessOptions {
  headerRows?: number;
  extensions?: readonly string[];
  sheet?: string;
}

export interface ProcessResult {
  batches: Batch[];
  issues: RowIssue[];
}

/**
 * Flatten a loaded config into pipeline options.
 */
export function optionsFromConfig(config: AppConfig, templates?: TemplateSet): ProcessExportOptions {
  return {
    headerRows: config.ingestion.headerRows,
    extensions: config.ingestion.extensions,
    ...(config.ingestion.sheet !== undefined ? { sheet: config.ingestion.sheet } : {}),
    barcodeMode: config.normalization.barcodeMode,
    onRowError: config.normalization.onRowError,
    ...(templates ? { templates } : {}),
  };
}

/**
 * Normalize projected records and build the batch → plate hierarchy.
 */
export function processRecords(records: readonly RawRecord[], options: ProcessOptions = {}): ProcessResult {
  const { table, issues } = normalizeRecords(records, {
    ...(options.barcodeMode ? { barcodeMode: options.barcodeMode } : {}),
    ...(options.onRowError ? { onRowError: options.onRowError } : {}),
  });
  const batches = partitionBatches(table);

  const { templates } = options;
  if (templates) {
    for (const batch of batches) {
      for (const plate of batch.plates) {
        plate.applyTemplates(templates);
      }
    }
  }

  return { batches, issues };
}

/**
 * Read an export file and process it. Resolves to null when the source
 * cannot be read.
 */
export async function processExport(path: string, options: ProcessExportOptions = {}): Promise<ProcessResult | null> {
  const records = await readRawTable(path, {
    ...(options.headerRows !== undefined ? { headerRows: options.headerRows } : {}),
    ...(options.extensions ? { extensions: options.extensions } : {}),
    ...(options.sheet ? { sheet: options.sheet } : {}),
  });
  if (!records) return null;
  return processRecords(records, options);
}
