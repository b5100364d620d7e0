/**
 * assay-batches — parsing and structuring of immunoassay instrument exports.
 *
 * This is the main entry point for the library.
 */

// Types
export * from './types/assay.js';
export { AssayPipelineError, isAssayPipelineError } from './errors/AssayPipelineError.js';
export type { AssayPipelineErrorCode } from './errors/AssayPipelineError.js';

// Field normalization
export { coerceNumeric, normalizeBarcode, parseLocation, pgToFg } from './normalize/fields.js';

// Ingestion boundary
export { readRawTable, DEFAULT_EXTENSIONS, DEFAULT_HEADER_ROWS } from './ingest/readRawTable.js';
export type { ReadRawTableOptions } from './ingest/readRawTable.js';

// Row table
export { RowTable, groupIndices } from './table/RowTable.js';
export { normalizeRecord, normalizeRecords } from './table/normalizeRecords.js';
export type { NormalizeOptions, NormalizeResult } from './table/normalizeRecords.js';

// Batches and plates
export { Batch, highestConcentration } from './batch/Batch.js';
export { Plate } from './batch/Plate.js';
export type { DesignCounts } from './batch/Plate.js';
export { partitionBatches, partitionPlates } from './batch/partition.js';

// Templates
export { applyTemplate, templateResolver } from './template/applyTemplate.js';
export { parseTemplate, parseTemplateSet, TemplateWireSchema } from './template/parseTemplate.js';
export type { TemplateWire } from './template/parseTemplate.js';
export { loadTemplateSet } from './template/loadTemplateSet.js';
export { columnTemplate, rowTemplate } from './template/types.js';
export type { Template, TemplateAxis, TemplateSet } from './template/types.js';

// Pipeline
export { optionsFromConfig, processExport, processRecords } from './pipeline/processExport.js';
export type { ProcessExportOptions, ProcessOptions, ProcessResult } from './pipeline/processExport.js';

// Configuration
export { loadConfig, validateConfig, ConfigValidationError } from './config/loader.js';
export type { LoadConfigOptions } from './config/loader.js';
export { DEFAULT_CONFIG } from './config/types.js';
export type { AppConfig, IngestionConfig, NormalizationConfig } from './config/types.js';
