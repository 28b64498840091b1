/**
 * CSV Codec
 *
 * Byte decoding with a latin-1 fallback, parsing to a header plus string
 * rows, and writing datasets back out with canonical column names.
 */

import fs from 'fs';
import Papa from 'papaparse';
import type { Dataset } from './dataset';
import { FormatError, InputNotFoundError, IoError } from './errors';
import { CANONICAL_FIELDS } from './record';

export type TextEncodingName = 'utf-8' | 'latin1';

export interface DecodedText {
  text: string;
  encoding: TextEncodingName;
}

export interface ParsedTable {
  header: string[];
  rows: string[][];
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Strict UTF-8 first (BOM dropped); on invalid sequences decode as latin-1,
 * which accepts any byte.
 */
export function decodeText(bytes: Uint8Array): DecodedText {
  try {
    return { text: new TextDecoder('utf-8', { fatal: true }).decode(bytes), encoding: 'utf-8' };
  } catch (err) {
    if (!(err instanceof TypeError)) throw err;
    return { text: Buffer.from(bytes).toString('latin1'), encoding: 'latin1' };
  }
}

export function readCsvText(path: string): DecodedText {
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(path);
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') {
      throw new InputNotFoundError(path);
    }
    throw new IoError('read', path, err);
  }
  return decodeText(bytes);
}

/**
 * Parses comma-separated text. Blank lines are skipped; short rows are padded
 * with empty strings up to the header width.
 */
export function parseCsv(text: string, source = 'input'): ParsedTable {
  const result = Papa.parse<string[]>(text, {
    header: false,
    delimiter: ',',
    skipEmptyLines: 'greedy',
  });

  const [firstError] = result.errors;
  if (firstError) {
    const where = firstError.row !== undefined ? ` at row ${firstError.row + 1}` : '';
    throw new FormatError(`Could not parse CSV '${source}'${where}: ${firstError.message}`);
  }

  const [header = [], ...body] = result.data;
  const width = header.length;
  const rows = body.map(cells =>
    cells.length >= width ? cells : [...cells, ...new Array<string>(width - cells.length).fill('')]
  );

  return { header: header.map(h => h.trim()), rows };
}

export function toCsv(dataset: Dataset): string {
  return Papa.unparse(
    {
      fields: [...CANONICAL_FIELDS],
      data: dataset.toRows().map(row => CANONICAL_FIELDS.map(field => row[field])),
    },
    { newline: '\n' }
  );
}

export function writeCsv(path: string, dataset: Dataset): void {
  try {
    fs.writeFileSync(path, toCsv(dataset) + '\n', 'utf-8');
  } catch (err) {
    throw new IoError('write', path, err);
  }
}
