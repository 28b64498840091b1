// Curated public API
export type {
  CanonicalField,
  CanonicalRow,
  DatasetStatistics,
  GeneratorConfig,
  Grade,
  GradeThresholds,
  ScoreBand,
  SortDirection,
  SortKey,
  StudentRecord,
  TermStatistics,
} from './types';
export { Dataset } from './lib/dataset';
export { createGenerator, scoreToGrade, validateGeneratorConfig, MAX_NAME_ATTEMPTS } from './lib/generator';
export type { Generator, GenerateOptions, RandomSource } from './lib/generator';
export { loadDataset, parseDataset, canLoad, normalizeColumns, COLUMN_ALIASES } from './lib/loader';
export type { LoadProbe, NormalizedTable } from './lib/loader';
export { toCsv, writeCsv, decodeText } from './lib/csv';
export { applyFilters, hasActiveFilters } from './lib/filters';
export type { ViewFilters } from './lib/filters';
export { fullName, hasPassed, PASSING_GRADE, CANONICAL_FIELDS } from './lib/record';
export {
  ExamDataError,
  ConfigurationError,
  GenerationExhaustedError,
  InputNotFoundError,
  FormatError,
  EmptyInputError,
  SchemaError,
  FieldValidationError,
  IoError,
  isExamDataError,
} from './lib/errors';
export type { ErrorKind, FieldErrorKind } from './lib/errors';
export {
  loadConfig,
  defaultGeneratorConfig,
  DEFAULT_CONFIG,
  DEFAULT_EXAM_TERMS,
  DEFAULT_GRADE_THRESHOLDS,
  DEFAULT_SCORE_DISTRIBUTION,
} from './lib/config';
export type { AppConfig } from './lib/config';
export { createLogger } from './lib/logger';
export type { Logger } from './lib/logger';
