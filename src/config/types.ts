/**
 * Configuration types for assay export processing.
 *
 * These types define the structure of assay.config.yaml and provide
 * type-safe access to pipeline settings.
 */

import type { BarcodeMode, RowErrorPolicy } from '../types/assay.js';

/**
 * Top-level configuration.
 */
export interface AppConfig {
  ingestion: IngestionConfig;
  normalization: NormalizationConfig;
}

/**
 * Ingestion boundary settings.
 */
export interface IngestionConfig {
  /** Rows preceding the header row in an export (default: 5) */
  headerRows: number;
  /** Accepted file extensions (default: ['.xls', '.xlsx', '.csv']) */
  extensions: string[];
  /** Worksheet to read (default: first sheet) */
  sheet?: string;
}

/**
 * Field normalization settings.
 */
export interface NormalizationConfig {
  /** Barcode conversion mode (default: 'strict') */
  barcodeMode: BarcodeMode;
  /** Skip failing records or abort on the first one (default: 'skip') */
  onRowError: RowErrorPolicy;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  ingestion: {
    headerRows: 5,
    extensions: ['.xls', '.xlsx', '.csv'],
  },
  normalization: {
    barcodeMode: 'strict',
    onRowError: 'skip',
  },
};
