/**
 * Error Types
 *
 * Every failure the engine reports is an ExamDataError with a `kind` the
 * caller can switch on. None of them are fatal to the process.
 */

import type { CanonicalField } from '../types';

export type ErrorKind =
  | 'configuration'
  | 'generation_exhausted'
  | 'input_not_found'
  | 'format'
  | 'empty_input'
  | 'schema'
  | 'type'
  | 'range'
  | 'empty_value'
  | 'duplicate'
  | 'io';

export class ExamDataError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExamDataError';
    this.kind = kind;
  }
}

// ============================================================================
// GENERATION
// ============================================================================

export class ConfigurationError extends ExamDataError {
  constructor(message: string) {
    super('configuration', message);
    this.name = 'ConfigurationError';
  }
}

export class GenerationExhaustedError extends ExamDataError {
  readonly attempts: number;

  constructor(studentId: number, attempts: number) {
    super(
      'generation_exhausted',
      `Could not generate a unique name for student ${studentId} after ${attempts} attempts.`
    );
    this.name = 'GenerationExhaustedError';
    this.attempts = attempts;
  }
}

// ============================================================================
// INPUT
// ============================================================================

export class InputNotFoundError extends ExamDataError {
  readonly path: string;

  constructor(path: string) {
    super('input_not_found', `File '${path}' does not exist.`);
    this.name = 'InputNotFoundError';
    this.path = path;
  }
}

export class FormatError extends ExamDataError {
  constructor(message: string) {
    super('format', message);
    this.name = 'FormatError';
  }
}

export class EmptyInputError extends ExamDataError {
  constructor(source: string) {
    super('empty_input', `CSV input '${source}' contains no data rows.`);
    this.name = 'EmptyInputError';
  }
}

export class SchemaError extends ExamDataError {
  readonly missing: CanonicalField[];
  readonly found: string[];

  constructor(source: string, missing: CanonicalField[], found: string[]) {
    super(
      'schema',
      `Missing columns in '${source}': ${missing.join(', ')}. ` +
        `Found columns: ${found.length > 0 ? found.join(', ') : '(none)'}.`
    );
    this.name = 'SchemaError';
    this.missing = missing;
    this.found = found;
  }
}

export type FieldErrorKind = Extract<ErrorKind, 'type' | 'range' | 'empty_value' | 'duplicate'>;

export class FieldValidationError extends ExamDataError {
  readonly field: CanonicalField;

  constructor(kind: FieldErrorKind, field: CanonicalField, message: string) {
    super(kind, message);
    this.name = 'FieldValidationError';
    this.field = field;
  }
}

export class IoError extends ExamDataError {
  readonly path: string;

  constructor(operation: 'read' | 'write', path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('io', `Could not ${operation} '${path}': ${reason}`, { cause });
    this.name = 'IoError';
    this.path = path;
  }
}

export function isExamDataError(error: unknown): error is ExamDataError {
  return error instanceof ExamDataError;
}
