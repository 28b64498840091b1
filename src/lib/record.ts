import type { CanonicalField, CanonicalRow, StudentRecord } from '../types';

export const PASSING_GRADE = 2;

/** Canonical column order for output files. */
export const CANONICAL_FIELDS: readonly CanonicalField[] = [
  'student_id',
  'first_name',
  'last_name',
  'term',
  'score',
  'grade',
];

export function fullName(record: StudentRecord): string {
  return `${record.firstName} ${record.lastName}`;
}

export function hasPassed(record: StudentRecord): boolean {
  return record.grade >= PASSING_GRADE;
}

export function toCanonicalRow(record: StudentRecord): CanonicalRow {
  return {
    student_id: record.studentId,
    first_name: record.firstName,
    last_name: record.lastName,
    term: record.term,
    score: record.score,
    grade: record.grade,
  };
}
