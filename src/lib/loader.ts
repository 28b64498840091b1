/**
 * CSV Loader
 *
 * Turns a CSV file (or already-decoded text) into a validated Dataset.
 * Column names are matched through a fixed alias table, then the columns are
 * checked in a fixed order so each failure has one well-defined reason.
 */

import fs from 'fs';
import path from 'path';
import type { CanonicalField, StudentRecord } from '../types';
import { readCsvText, parseCsv } from './csv';
import { Dataset } from './dataset';
import {
  EmptyInputError,
  FieldValidationError,
  FormatError,
  InputNotFoundError,
  SchemaError,
  isExamDataError,
} from './errors';
import { CANONICAL_FIELDS } from './record';
import {
  MAX_GRADE,
  MAX_SCORE,
  MIN_GRADE,
  MIN_SCORE,
  isNonEmptyText,
  parseInteger,
  parseNumber,
  sanitizeString,
} from './validation';

// ============================================================================
// COLUMN ALIASES
// ============================================================================

/** Accepted spellings per canonical column, highest priority first. */
export const COLUMN_ALIASES: Readonly<Record<CanonicalField, readonly string[]>> = {
  student_id: ['id', 'student_id', 'studentid', 'šifra'],
  first_name: ['ime', 'first_name', 'firstname', 'name'],
  last_name: ['prezime', 'last_name', 'lastname', 'surname'],
  term: ['termin', 'term', 'datum', 'date', 'ispitni_rok'],
  score: ['bodovi', 'score', 'points', 'bod'],
  grade: ['ocjena', 'grade', 'ocj'],
};

export interface NormalizedTable {
  /** Canonical field -> column position in the source */
  columns: Partial<Record<CanonicalField, number>>;
  /** Headers that matched no alias, kept with their positions */
  unrecognized: { name: string; index: number }[];
  header: string[];
  rows: string[][];
}

/**
 * Resolves canonical columns in one pass over the header. The first alias
 * present wins; a repeated header resolves to its leftmost column.
 */
export function normalizeColumns(header: readonly string[]): Pick<NormalizedTable, 'columns' | 'unrecognized'> {
  const positions = new Map<string, number>();
  header.forEach((name, index) => {
    const key = name.trim().toLowerCase();
    if (!positions.has(key)) positions.set(key, index);
  });

  const columns: Partial<Record<CanonicalField, number>> = {};
  const claimed = new Set<number>();
  for (const field of CANONICAL_FIELDS) {
    for (const alias of COLUMN_ALIASES[field]) {
      const index = positions.get(alias.toLowerCase());
      if (index !== undefined && !claimed.has(index)) {
        columns[field] = index;
        claimed.add(index);
        break;
      }
    }
  }

  const unrecognized = header
    .map((name, index) => ({ name, index }))
    .filter(({ index }) => !claimed.has(index));

  return { columns, unrecognized };
}

// ============================================================================
// VALIDATION
// ============================================================================

type ResolvedColumns = Record<CanonicalField, number>;

function resolveColumns(table: NormalizedTable, source: string): ResolvedColumns {
  const { columns } = table;
  const missing = CANONICAL_FIELDS.filter(field => columns[field] === undefined);
  const {
    student_id: studentId,
    first_name: firstName,
    last_name: lastName,
    term,
    score,
    grade,
  } = columns;

  if (
    missing.length > 0 ||
    studentId === undefined ||
    firstName === undefined ||
    lastName === undefined ||
    term === undefined ||
    score === undefined ||
    grade === undefined
  ) {
    throw new SchemaError(source, missing, table.header);
  }

  return { student_id: studentId, first_name: firstName, last_name: lastName, term, score, grade };
}

/**
 * Coerces a whole column; the first cell that fails makes the column invalid
 */
function coerceColumn(
  rows: readonly string[][],
  index: number,
  field: CanonicalField,
  parse: (raw: string | undefined) => number | null,
  expected: string
): number[] {
  return rows.map((cells, rowIndex) => {
    const value = parse(cells[index]);
    if (value === null) {
      throw new FieldValidationError(
        'type',
        field,
        `Column '${field}' must be ${expected}: row ${rowIndex + 1} has '${sanitizeString(cells[index] ?? '')}'.`
      );
    }
    return value;
  });
}

function assertColumnRange(
  values: readonly number[],
  field: CanonicalField,
  min: number,
  max: number
): void {
  const rowIndex = values.findIndex(v => v < min || v > max);
  if (rowIndex >= 0) {
    throw new FieldValidationError(
      'range',
      field,
      `Column '${field}' must be in the range ${min}-${max}: row ${rowIndex + 1} has ${values[rowIndex]}.`
    );
  }
}

function assertColumnFilled(rows: readonly string[][], index: number, field: CanonicalField): void {
  const rowIndex = rows.findIndex(cells => !isNonEmptyText(cells[index]));
  if (rowIndex >= 0) {
    throw new FieldValidationError(
      'empty_value',
      field,
      `Column '${field}' must not have empty values: row ${rowIndex + 1} is empty.`
    );
  }
}

/**
 * Runs the column checks in order and builds records. Uniqueness of ids is
 * enforced by Dataset.fromRecords.
 */
export function validateTable(table: NormalizedTable, source: string): StudentRecord[] {
  const col = resolveColumns(table, source);
  const { rows } = table;

  const scores = coerceColumn(rows, col.score, 'score', parseNumber, 'numeric');
  const grades = coerceColumn(rows, col.grade, 'grade', parseInteger, 'an integer');
  assertColumnRange(scores, 'score', MIN_SCORE, MAX_SCORE);
  assertColumnRange(grades, 'grade', MIN_GRADE, MAX_GRADE);
  assertColumnFilled(rows, col.first_name, 'first_name');
  assertColumnFilled(rows, col.last_name, 'last_name');
  assertColumnFilled(rows, col.term, 'term');
  const ids = coerceColumn(rows, col.student_id, 'student_id', parseInteger, 'an integer');
  assertColumnRange(ids, 'student_id', 1, Number.MAX_SAFE_INTEGER);

  return rows.map((cells, i) => ({
    studentId: ids[i],
    firstName: cells[col.first_name].trim(),
    lastName: cells[col.last_name].trim(),
    term: cells[col.term].trim(),
    // Fractional scores are truncated toward zero
    score: Math.trunc(scores[i]),
    grade: grades[i],
  }));
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Parses and validates decoded CSV text. `sourcePath` becomes the Dataset's
 * provenance and is used in error messages.
 */
export function parseDataset(text: string, sourcePath?: string): Dataset {
  const source = sourcePath ?? 'input';
  const { header, rows } = parseCsv(text, source);
  if (rows.length === 0) {
    throw new EmptyInputError(source);
  }

  const table: NormalizedTable = { ...normalizeColumns(header), header, rows };
  return Dataset.fromRecords(validateTable(table, source), sourcePath);
}

/**
 * Loads a CSV file into a Dataset with the file path as provenance
 */
export function loadDataset(filePath: string): Dataset {
  if (!fs.existsSync(filePath)) {
    throw new InputNotFoundError(filePath);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== '.csv') {
    throw new FormatError(`File must be in CSV format, not '${ext || '(no extension)'}'.`);
  }

  const { text } = readCsvText(filePath);
  return parseDataset(text, filePath);
}

export interface LoadProbe {
  ok: boolean;
  reason: string;
}

/**
 * Pre-flight check: runs the full load and reports the outcome instead of
 * throwing.
 */
export function canLoad(filePath: string): LoadProbe {
  try {
    loadDataset(filePath);
    return { ok: true, reason: 'OK' };
  } catch (err) {
    if (isExamDataError(err)) {
      return { ok: false, reason: err.message };
    }
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, reason: `Unexpected error: ${message}` };
  }
}
