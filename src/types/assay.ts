/**
 * Core type definitions for assay export processing.
 *
 * These types describe the row-level data model that flows from the
 * ingestion boundary through normalization, partitioning and template
 * mapping.
 */

export const PLATE_ROWS = ['A', 'B', 'C', 'D', 'E', 'F', 'G', 'H'] as const;
export const PLATE_COLUMNS = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12] as const;

export type RowLetter = (typeof PLATE_ROWS)[number];
export type ColumnNumber = (typeof PLATE_COLUMNS)[number];

/**
 * Header names kept from an instrument export. Every other column is dropped.
 */
export const REQUIRED_FIELDS = [
  'Sample Barcode',
  'Location',
  'Sample Type',
  'Batch Name',
  'AEB',
  'Concentration',
  'Flags',
] as const;

export type RequiredField = (typeof REQUIRED_FIELDS)[number];

/**
 * One projected export row, every value rendered as text.
 */
export type RawRecord = Record<RequiredField, string>;

/**
 * Decoded well address.
 */
export interface WellLocation {
  plate: number;
  row: RowLetter;
  column: ColumnNumber;
}

/**
 * Numeric barcodes become integers; anything else is uppercased.
 */
export type SampleBarcode = number | string;

/**
 * A normalized sample measurement. Absent numeric values are null.
 */
export interface SampleRow extends WellLocation {
  sampleBarcode: SampleBarcode;
  location: string;
  sampleType: string;
  batchName: string;
  aeb: number | null;
  /** Concentration in pg/ml */
  concentrationPgMl: number | null;
  /** Always 1000 × concentrationPgMl, null in lockstep */
  concentrationFgMl: number | null;
  flags: string;
}

/**
 * Value that a later stage has not computed yet.
 */
export type Computed<T> =
  | { state: 'not-computed' }
  | { state: 'computed'; value: T };

export const NOT_COMPUTED = { state: 'not-computed' } as const;

/**
 * Label a template may assign to a well.
 */
export type TemplateLabel = string | number;

/**
 * Design field on a plate row.
 *
 * `unset` until a template is applied; afterwards `assigned` or
 * `unassigned` when the template has no entry for the coordinate.
 */
export type DesignValue =
  | { readonly status: 'unset' }
  | { readonly status: 'unassigned' }
  | { readonly status: 'assigned'; readonly value: TemplateLabel };

export type DesignField = 'dilution' | 'feeders' | 'replicate';

/**
 * Sample row owned by a plate, carrying its experimental-design fields.
 */
export type PlateRow = Readonly<SampleRow> & Record<DesignField, DesignValue>;

/**
 * Barcode handling:
 * - strict: only an all-digit barcode is converted to an integer
 * - prefix: a leading digit run selects integer conversion, which must
 *   then succeed for the whole value
 */
export type BarcodeMode = 'strict' | 'prefix';

/**
 * What normalization does with a record that fails to parse.
 */
export type RowErrorPolicy = 'skip' | 'throw';

export interface RowIssue {
  /** Zero-based index of the record in the ingested table */
  index: number;
  code: string;
  message: string;
}
