import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import * as XLSX from 'xlsx';
import { REQUIRED_FIELDS } from '../types/assay.js';
import type { RawRecord, RequiredField } from '../types/assay.js';

export const DEFAULT_HEADER_ROWS = 5;
export const DEFAULT_EXTENSIONS: readonly string[] = ['.xls', '.xlsx', '.csv'];

export interface ReadRawTableOptions {
  /** Number of rows preceding the header row (default: 5) */
  headerRows?: number;
  /** Accepted file extensions, lowercase with leading dot */
  extensions?: readonly string[];
  /** Worksheet name (default: first sheet) */
  sheet?: string;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) return value.toISOString();
  return '';
}

async function readSource(path: string): Promise<Buffer | null> {
  try {
    return await readFile(path);
  } catch (err) {
    if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'EISDIR')) {
      console.warn(`Export file not found: ${path}`);
      return null;
    }
    throw err;
  }
}

function readWorkbook(path: string, content: Buffer): XLSX.WorkBook | null {
  try {
    // raw: keep CSV text as-is so barcodes such as "007" keep their digits
    return XLSX.read(content, { type: 'buffer', raw: true });
  } catch (err) {
    console.warn(`Could not parse export file ${path}: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

/**
 * Read an instrument export into projected records.
 *
 * Returns null when the file is missing, has an unsupported extension,
 * cannot be parsed, or lacks one of the required columns. Any other I/O
 * error is rethrown.
 */
export async function readRawTable(path: string, options: ReadRawTableOptions = {}): Promise<RawRecord[] | null> {
  const headerRows = options.headerRows ?? DEFAULT_HEADER_ROWS;
  const extensions = options.extensions ?? DEFAULT_EXTENSIONS;
  const absolutePath = resolve(path);

  const extension = extname(absolutePath).toLowerCase();
  if (!extensions.includes(extension)) {
    console.warn(`Unsupported export format "${extension || '(none)'}": ${absolutePath}`);
    return null;
  }

  const content = await readSource(absolutePath);
  if (!content) return null;

  const workbook = readWorkbook(absolutePath, content);
  if (!workbook) return null;

  const sheetName = options.sheet ?? workbook.SheetNames[0];
  const sheet = sheetName !== undefined ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    console.warn(`Worksheet ${sheetName ?? '(none)'} not found in ${absolutePath}`);
    return null;
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: '' });
  const header = (matrix[headerRows] ?? []).map((cell) => cellText(cell).trim());

  const columnIndex = new Map<RequiredField, number>();
  const missing: string[] = [];
  for (const field of REQUIRED_FIELDS) {
    const idx = header.indexOf(field);
    if (idx < 0) {
      missing.push(field);
    } else {
      columnIndex.set(field, idx);
    }
  }
  if (missing.length > 0) {
    console.warn(`Export ${absolutePath} is missing required columns: ${missing.join(', ')}`);
    return null;
  }

  const records: RawRecord[] = [];
  for (const cells of matrix.slice(headerRows + 1)) {
    const text = cells.map(cellText);
    if (text.every((cell) => cell.trim().length === 0)) continue;
    const field = (name: RequiredField): string => text[columnIndex.get(name) ?? -1] ?? '';
    records.push({
      'Sample Barcode': field('Sample Barcode'),
      Location: field('Location'),
      'Sample Type': field('Sample Type'),
      'Batch Name': field('Batch Name'),
      AEB: field('AEB'),
      Concentration: field('Concentration'),
      Flags: field('Flags'),
    });
  }
  return records;
}
