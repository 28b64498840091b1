/**
 * Configuration
 *
 * Settings come from the environment (scripts call dotenv first, so a .env
 * file works too). Bad values fall back to the defaults with a warning.
 */

import names from '../data/names.json';
import type { GeneratorConfig, GradeThresholds, ScoreBand } from '../types';
import { createLogger } from './logger';
import { validateNumberParam } from './validation';

const log = createLogger('config');

export const DEFAULT_EXAM_TERMS: readonly string[] = ['2025-01', '2025-02', '2025-06', '2025-09'];

export const DEFAULT_GRADE_THRESHOLDS: GradeThresholds = {
  5: 90,
  4: 80,
  3: 65,
  2: 50,
  1: 0,
};

export const DEFAULT_SCORE_DISTRIBUTION: readonly ScoreBand[] = [
  { upperBound: 0.15, mean: 25, stddev: 10, min: 0, max: 49 },
  { upperBound: 0.3, mean: 55, stddev: 8, min: 50, max: 64 },
  { upperBound: 0.55, mean: 70, stddev: 6, min: 65, max: 79 },
  { upperBound: 0.8, mean: 85, stddev: 5, min: 80, max: 89 },
  { upperBound: 1.0, mean: 93, stddev: 4, min: 90, max: 100 },
];

export interface AppConfig {
  defaultStudentCount: number;
  maxStudentCount: number;
  defaultCsvPath: string;
  examTerms: readonly string[];
}

export const DEFAULT_CONFIG: AppConfig = {
  defaultStudentCount: 50,
  maxStudentCount: 500,
  defaultCsvPath: 'exam_results.csv',
  examTerms: DEFAULT_EXAM_TERMS,
};

type Env = Record<string, string | undefined>;

function readCount(env: Env, name: string, fallback: number, max: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const result = validateNumberParam(raw, 1, max, name);
  if (!result.valid) {
    log.warn(`Ignoring ${name}: ${result.error}`, { value: raw, fallback });
    return fallback;
  }
  return result.value ?? fallback;
}

function readTerms(env: Env): readonly string[] {
  const raw = env.EXAM_TERMS;
  if (raw === undefined) return DEFAULT_EXAM_TERMS;

  const terms = [...new Set(raw.split(',').map(t => t.trim()).filter(t => t.length > 0))];
  if (terms.length === 0) {
    log.warn('Ignoring EXAM_TERMS: no terms listed', { value: raw });
    return DEFAULT_EXAM_TERMS;
  }
  return terms;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const maxStudentCount = readCount(
    env,
    'MAX_STUDENT_COUNT',
    DEFAULT_CONFIG.maxStudentCount,
    Number.MAX_SAFE_INTEGER
  );
  const defaultStudentCount = readCount(
    env,
    'STUDENT_COUNT',
    Math.min(DEFAULT_CONFIG.defaultStudentCount, maxStudentCount),
    maxStudentCount
  );
  const csvPath = env.CSV_PATH?.trim();

  const config: AppConfig = {
    defaultStudentCount,
    maxStudentCount,
    defaultCsvPath: csvPath ? csvPath : DEFAULT_CONFIG.defaultCsvPath,
    examTerms: readTerms(env),
  };

  log.debug('Configuration loaded', { ...config });
  return config;
}

/**
 * Default generator settings: bundled name pools plus the given terms
 */
export function defaultGeneratorConfig(terms: readonly string[] = DEFAULT_EXAM_TERMS): GeneratorConfig {
  return {
    maleNames: names.maleNames,
    femaleNames: names.femaleNames,
    surnames: names.surnames,
    terms,
    scoreDistribution: DEFAULT_SCORE_DISTRIBUTION,
    gradeThresholds: DEFAULT_GRADE_THRESHOLDS,
  };
}
