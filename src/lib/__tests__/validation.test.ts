import { describe, it, expect } from 'vitest';
import {
  isNonEmptyText,
  isValidGrade,
  isValidScore,
  isValidSearchQuery,
  isValidStudentId,
  parseInteger,
  parseNumber,
  sanitizeString,
  validateNumberParam,
  validateQueryParam,
} from '../validation';

describe('field predicates', () => {
  it('checks student ids', () => {
    expect(isValidStudentId(1)).toBe(true);
    expect(isValidStudentId(0)).toBe(false);
    expect(isValidStudentId(1.5)).toBe(false);
    expect(isValidStudentId('1')).toBe(false);
  });

  it('checks scores and grades', () => {
    expect(isValidScore(0)).toBe(true);
    expect(isValidScore(100)).toBe(true);
    expect(isValidScore(100.5)).toBe(false);
    expect(isValidScore(-1)).toBe(false);
    expect(isValidGrade(1)).toBe(true);
    expect(isValidGrade(5)).toBe(true);
    expect(isValidGrade(6)).toBe(false);
  });

  it('treats whitespace-only text as empty', () => {
    expect(isNonEmptyText('Ana')).toBe(true);
    expect(isNonEmptyText(' \t')).toBe(false);
    expect(isNonEmptyText(undefined)).toBe(false);
  });
});

describe('cell coercion', () => {
  it('parses numbers and rejects blanks and junk', () => {
    expect(parseNumber(' 85.5 ')).toBe(85.5);
    expect(parseNumber('')).toBeNull();
    expect(parseNumber(undefined)).toBeNull();
    expect(parseNumber('12abc')).toBeNull();
    expect(parseNumber('Infinity')).toBeNull();
    expect(parseNumber('0x41')).toBeNull();
    expect(parseNumber('0b11')).toBeNull();
    expect(parseNumber('1e2')).toBe(100);
    expect(parseNumber('-.5')).toBe(-0.5);
    expect(parseNumber('+7')).toBe(7);
  });

  it('accepts integral values only as integers', () => {
    expect(parseInteger('4')).toBe(4);
    expect(parseInteger('4.0')).toBe(4);
    expect(parseInteger('4.5')).toBeNull();
  });
});

describe('search query validation', () => {
  it('rejects control characters and overlong queries', () => {
    expect(isValidSearchQuery('Horvat')).toBe(true);
    expect(isValidSearchQuery('Hor\x00vat')).toBe(false);
    expect(isValidSearchQuery('a'.repeat(201))).toBe(false);
    expect(isValidSearchQuery('   ')).toBe(false);
  });

  it('treats an absent query as no query', () => {
    expect(validateQueryParam(undefined)).toEqual({ valid: true });
    expect(validateQueryParam('')).toEqual({ valid: true });
  });

  it('trims accepted queries', () => {
    expect(validateQueryParam('  ana ')).toEqual({ valid: true, value: 'ana' });
  });

  it('explains rejected queries', () => {
    expect(validateQueryParam('\x07')).toEqual({
      valid: false,
      error: 'Invalid query parameter. Must be 1-200 characters with no control characters.',
    });
  });
});

describe('validateNumberParam', () => {
  it('accepts values in range', () => {
    expect(validateNumberParam('42', 1, 100, 'count')).toEqual({ valid: true, value: 42 });
  });

  it('names the parameter in errors', () => {
    expect(validateNumberParam('abc', 1, 100, 'count')).toEqual({
      valid: false,
      error: 'Invalid count. Must be a number.',
    });
    expect(validateNumberParam('2.5', 1, 100, 'count')).toEqual({
      valid: false,
      error: 'Invalid count. Must be a whole number.',
    });
    expect(validateNumberParam('0', 1, 100, 'count')).toEqual({
      valid: false,
      error: 'count must be between 1 and 100.',
    });
  });

  it('allows fractions when asked', () => {
    expect(validateNumberParam('2.5', 0, 5, 'value', false)).toEqual({ valid: true, value: 2.5 });
  });
});

describe('sanitizeString', () => {
  it('strips control characters and truncates', () => {
    expect(sanitizeString('a\x01b')).toBe('ab');
    expect(sanitizeString('abcdef', 3)).toBe('abc...');
    expect(sanitizeString(12)).toBe('12');
  });
});
