/**
 * Input Validation Utilities
 *
 * Field predicates for exam records, coercion of raw CSV cells, and
 * validators for user-supplied parameters (script arguments, filter input).
 */

// ============================================================================
// FIELD VALIDATORS
// ============================================================================

export const MIN_SCORE = 0;
export const MAX_SCORE = 100;
export const MIN_GRADE = 1;
export const MAX_GRADE = 5;

/**
 * Validates that a value is a positive integer student id
 */
export function isValidStudentId(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1;
}

/**
 * Validates that a value is an integer score (0-100)
 */
export function isValidScore(value: unknown): value is number {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= MIN_SCORE &&
    value <= MAX_SCORE
  );
}

/**
 * Validates that a value is an integer grade (1-5)
 */
export function isValidGrade(value: unknown): value is number {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= MIN_GRADE &&
    value <= MAX_GRADE
  );
}

/**
 * Whitespace-only strings count as empty
 */
export function isNonEmptyText(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

// ============================================================================
// COERCION
// ============================================================================

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parses a raw cell as a finite decimal number. Returns null for blanks and
 * anything else, including hex, octal and binary literals.
 */
export function parseNumber(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const num = Number(trimmed);
  return Number.isFinite(num) ? num : null;
}

/**
 * Like parseNumber but rejects values with a fractional part ("4.0" is fine)
 */
export function parseInteger(raw: string | undefined): number | null {
  const num = parseNumber(raw);
  return num !== null && Number.isInteger(num) ? num : null;
}

/**
 * Validates that a string is a valid search query
 * - No null bytes
 * - Reasonable length
 * - No control characters
 */
export function isValidSearchQuery(value: unknown): boolean {
  if (typeof value !== 'string') return false;
  const trimmed = value.trim();
  if (trimmed.length > 200) return false;
  if (/[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/.test(trimmed)) return false;
  return trimmed.length >= 1;
}

/**
 * Sanitises a string for safe logging/output
 */
export function sanitizeString(value: unknown, maxLength = 100): string {
  if (typeof value !== 'string') return String(value);
  let sanitized = value.replace(/[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/g, '');
  if (sanitized.length > maxLength) {
    sanitized = sanitized.substring(0, maxLength) + '...';
  }
  return sanitized;
}

// ============================================================================
// PARAMETER VALIDATION
// ============================================================================

export type ParamResult<T> = { valid: true; value?: T } | { valid: false; error: string };

/**
 * Validates the query parameter for search; absent means "no query"
 */
export function validateQueryParam(query: string | null | undefined): ParamResult<string> {
  if (!query) {
    return { valid: true };
  }

  if (!isValidSearchQuery(query)) {
    return {
      valid: false,
      error: 'Invalid query parameter. Must be 1-200 characters with no control characters.',
    };
  }

  return { valid: true, value: query.trim() };
}

/**
 * Validates a numeric parameter within a range
 */
export function validateNumberParam(
  value: string,
  min: number,
  max: number,
  paramName = 'value',
  integer = true
): ParamResult<number> {
  const num = parseNumber(value);
  if (num === null) {
    return { valid: false, error: `Invalid ${paramName}. Must be a number.` };
  }

  if (integer && !Number.isInteger(num)) {
    return { valid: false, error: `Invalid ${paramName}. Must be a whole number.` };
  }

  if (num < min || num > max) {
    return { valid: false, error: `${paramName} must be between ${min} and ${max}.` };
  }

  return { valid: true, value: num };
}
