import { AssayPipelineError } from '../errors/AssayPipelineError.js';
import { PLATE_ROWS } from '../types/assay.js';
import type {
  BarcodeMode,
  ColumnNumber,
  RowLetter,
  SampleBarcode,
  WellLocation,
} from '../types/assay.js';

/**
 * "Plate <N> - Well <L><NN>", tokens separated by exactly one space.
 */
const LOCATION_PATTERN = /^Plate (\d+) - Well ([A-Z])(\d{1,2})$/;

const ALL_DIGITS = /^\d+$/;
const LEADING_DIGITS = /^\d+/;
const DECIMAL_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function isRowLetter(value: string): value is RowLetter {
  return PLATE_ROWS.some((row) => row === value);
}

export function isColumnNumber(value: number): value is ColumnNumber {
  return Number.isInteger(value) && value >= 1 && value <= 12;
}

function malformedLocation(raw: string, reason: string): AssayPipelineError {
  return new AssayPipelineError('MALFORMED_LOCATION', `Malformed location "${raw}": ${reason}`, { location: raw });
}

/**
 * Decode an instrument location string into plate, row and column.
 *
 * @throws AssayPipelineError MALFORMED_LOCATION when the string does not
 *   match the export format exactly
 */
export function parseLocation(raw: string): WellLocation {
  const match = LOCATION_PATTERN.exec(raw);
  if (!match) {
    throw malformedLocation(raw, 'expected "Plate <n> - Well <row><column>"');
  }
  const [, plateText = '', rowText = '', columnText = ''] = match;

  const plate = Number.parseInt(plateText, 10);
  if (!Number.isSafeInteger(plate) || plate < 1) {
    throw malformedLocation(raw, `plate number must be a positive integer, got ${plateText}`);
  }
  if (!isRowLetter(rowText)) {
    throw malformedLocation(raw, `row must be one of ${PLATE_ROWS.join('')}, got ${rowText}`);
  }
  const column = Number.parseInt(columnText, 10);
  if (!isColumnNumber(column)) {
    throw malformedLocation(raw, `column must be between 1 and 12, got ${columnText}`);
  }

  return { plate, row: rowText, column };
}

/**
 * Convert numeric barcodes to integers and uppercase everything else
 * (calibrator and QC barcodes such as "qc1").
 */
export function normalizeBarcode(raw: string, mode: BarcodeMode = 'strict'): SampleBarcode {
  const value = raw.trim();

  if (mode === 'prefix' && LEADING_DIGITS.test(value) && !ALL_DIGITS.test(value)) {
    throw new AssayPipelineError(
      'BARCODE_CONVERSION_AMBIGUITY',
      `Barcode "${raw}" starts with digits but is not an integer`,
      { barcode: raw },
    );
  }

  if (ALL_DIGITS.test(value)) {
    const n = Number.parseInt(value, 10);
    // Past 2^53 the integer would lose digits; keep the text.
    return Number.isSafeInteger(n) ? n : value;
  }
  return value.toUpperCase();
}

/**
 * Parse a numeric export field. Blank or non-numeric text becomes null.
 */
export function coerceNumeric(raw: string): number | null {
  const text = raw.trim();
  if (!DECIMAL_NUMBER.test(text)) return null;
  const value = Number.parseFloat(text);
  return Number.isFinite(value) ? value : null;
}

/**
 * Convert a pg/ml concentration to fg/ml.
 */
export function pgToFg(value: number | null): number | null {
  return value === null ? null : value * 1000;
}
