/**
 * Dataset
 *
 * Ordered, immutable collection of exam records. Every transformation
 * returns a new Dataset; derived views (statistics, name index) are computed
 * once per instance on first use.
 */

import type {
  CanonicalRow,
  DatasetStatistics,
  SortDirection,
  SortKey,
  StudentRecord,
  TermStatistics,
} from '../types';
import { FieldValidationError } from './errors';
import { toCanonicalRow } from './record';
import { createNameIndex, normalizeQuery, recordMatchesQuery, sortRecords, type NameIndex } from './search';
import { computeStatistics, gradeDistribution, termStatistics } from './statistics';
import {
  isNonEmptyText,
  isValidGrade,
  isValidScore,
  isValidStudentId,
  sanitizeString,
} from './validation';

/**
 * Checks one record against the field constraints; `position` is the
 * 1-based row used in error messages.
 */
function assertValidRecord(record: StudentRecord, position: number): void {
  if (!isValidStudentId(record.studentId)) {
    throw new FieldValidationError(
      'type',
      'student_id',
      `Row ${position}: student_id must be a positive integer, got '${sanitizeString(String(record.studentId))}'.`
    );
  }
  if (!isNonEmptyText(record.firstName)) {
    throw new FieldValidationError('empty_value', 'first_name', `Row ${position}: first_name must not be empty.`);
  }
  if (!isNonEmptyText(record.lastName)) {
    throw new FieldValidationError('empty_value', 'last_name', `Row ${position}: last_name must not be empty.`);
  }
  if (!isNonEmptyText(record.term)) {
    throw new FieldValidationError('empty_value', 'term', `Row ${position}: term must not be empty.`);
  }
  if (!isValidScore(record.score)) {
    throw new FieldValidationError(
      'range',
      'score',
      `Row ${position}: score must be an integer in the range 0-100, got ${record.score}.`
    );
  }
  if (!isValidGrade(record.grade)) {
    throw new FieldValidationError(
      'range',
      'grade',
      `Row ${position}: grade must be an integer in the range 1-5, got ${record.grade}.`
    );
  }
}

export class Dataset implements Iterable<StudentRecord> {
  readonly #records: readonly StudentRecord[];
  readonly #sourcePath: string | undefined;
  #statistics: DatasetStatistics | undefined;
  #nameIndex: NameIndex | undefined;

  private constructor(records: readonly StudentRecord[], sourcePath: string | undefined) {
    this.#records = Object.freeze(records.slice());
    this.#sourcePath = sourcePath;
  }

  /**
   * Validates every record and the uniqueness of student ids, then builds
   * the Dataset. Records are copied and frozen.
   */
  static fromRecords(records: Iterable<StudentRecord>, sourcePath?: string): Dataset {
    const frozen: StudentRecord[] = [];
    const seen = new Map<number, number>();

    for (const input of records) {
      const position = frozen.length + 1;
      const record: StudentRecord = Object.freeze({
        studentId: input.studentId,
        firstName: input.firstName,
        lastName: input.lastName,
        term: input.term,
        score: input.score,
        grade: input.grade,
      });
      assertValidRecord(record, position);

      const firstSeen = seen.get(record.studentId);
      if (firstSeen !== undefined) {
        throw new FieldValidationError(
          'duplicate',
          'student_id',
          `Row ${position}: student_id ${record.studentId} duplicates row ${firstSeen}.`
        );
      }
      seen.set(record.studentId, position);
      frozen.push(record);
    }

    return new Dataset(frozen, sourcePath);
  }

  static empty(): Dataset {
    return new Dataset([], undefined);
  }

  /** Origin path for loaded or persisted data; undefined for in-memory data. */
  get sourcePath(): string | undefined {
    return this.#sourcePath;
  }

  recordCount(): number {
    return this.#records.length;
  }

  isEmpty(): boolean {
    return this.#records.length === 0;
  }

  at(index: number): StudentRecord | undefined {
    return this.#records[index];
  }

  records(): readonly StudentRecord[] {
    return this.#records;
  }

  [Symbol.iterator](): Iterator<StudentRecord> {
    return this.#records[Symbol.iterator]();
  }

  toRows(): CanonicalRow[] {
    return this.#records.map(toCanonicalRow);
  }

  // ==========================================================================
  // DERIVED VIEWS
  // ==========================================================================

  terms(): string[] {
    return [...new Set(this.#records.map(r => r.term))].sort();
  }

  gradesPresent(): number[] {
    return [...new Set(this.#records.map(r => r.grade))].sort((a, b) => a - b);
  }

  gradeDistribution(): Record<number, number> {
    return gradeDistribution(this.#records);
  }

  statistics(): DatasetStatistics {
    this.#statistics ??= computeStatistics(this.#records);
    return structuredClone(this.#statistics);
  }

  /** Zeroed statistics when the term does not occur. */
  termStatistics(term: string): TermStatistics {
    return termStatistics(this.#records.filter(r => r.term === term));
  }

  // ==========================================================================
  // TRANSFORMATIONS
  // ==========================================================================

  filterByTerm(term: string): Dataset {
    return this.#derive(this.#records.filter(r => r.term === term));
  }

  filterByGrade(grade: number): Dataset {
    return this.#derive(this.#records.filter(r => r.grade === grade));
  }

  /** Inclusive on both ends; an inverted range yields an empty Dataset. */
  filterByScoreRange(min: number, max: number): Dataset {
    return this.#derive(this.#records.filter(r => r.score >= min && r.score <= max));
  }

  /**
   * Case-insensitive substring search over first and last name. The query is
   * trimmed first; an empty query matches every record.
   */
  search(query: string): Dataset {
    const normalized = normalizeQuery(query);
    return this.#derive(this.#records.filter(r => recordMatchesQuery(r, normalized)));
  }

  /**
   * Typo-tolerant name search, best matches first. An empty query returns
   * the records unchanged.
   */
  fuzzySearch(query: string): Dataset {
    if (normalizeQuery(query).length === 0) {
      return this.#derive(this.#records);
    }
    this.#nameIndex ??= createNameIndex(this.#records);
    const records = this.#records;
    return this.#derive(this.#nameIndex.search(query).map(i => records[i]));
  }

  sortBy(key: SortKey = 'studentId', direction: SortDirection = 'asc'): Dataset {
    return this.#derive(sortRecords(this.#records, key, direction));
  }

  // Subsets of validated records need no re-validation
  #derive(records: readonly StudentRecord[]): Dataset {
    return new Dataset(records, this.#sourcePath);
  }
}
