/**
 * Synthetic Data Generator
 *
 * Produces plausible exam datasets: unique student names drawn from two
 * first-name pools and a surname pool, a random term, and a score drawn from
 * a banded normal distribution and graded with the threshold table.
 */

import type { Grade, GeneratorConfig, GradeThresholds, ScoreBand, StudentRecord } from '../types';
import { defaultGeneratorConfig } from './config';
import { writeCsv } from './csv';
import { Dataset } from './dataset';
import { ConfigurationError, GenerationExhaustedError } from './errors';
import { MAX_SCORE, MIN_SCORE } from './validation';

/** Uniform value in [0, 1) */
export type RandomSource = () => number;

export const MAX_NAME_ATTEMPTS = 1000;

const GRADES_DESCENDING: readonly Grade[] = [5, 4, 3, 2, 1];

// ============================================================================
// GRADING
// ============================================================================

/**
 * Highest grade whose threshold does not exceed the score; grade 1 when the
 * score is below every threshold.
 */
export function scoreToGrade(score: number, thresholds: GradeThresholds): Grade {
  for (const grade of GRADES_DESCENDING) {
    if (score >= thresholds[grade]) {
      return grade;
    }
  }
  return 1;
}

// ============================================================================
// RANDOM DRAWS
// ============================================================================

function pick<T>(random: RandomSource, values: readonly T[]): T {
  // Guard against sources that return exactly 1
  const index = Math.min(Math.floor(random() * values.length), values.length - 1);
  return values[index];
}

/**
 * Box-Muller transform over the injected source
 */
export function normalSample(random: RandomSource, mean: number, stddev: number): number {
  const u1 = 1 - random(); // (0, 1], keeps log finite
  const u2 = random();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + z * stddev;
}

/**
 * First band whose cumulative upper bound exceeds `roll`
 */
export function selectBand(bands: readonly ScoreBand[], roll: number): ScoreBand {
  const band = bands.find(b => b.upperBound > roll);
  // Config validation makes the last bound 1, so only roll >= 1 gets here
  return band ?? bands[bands.length - 1];
}

export function drawScore(random: RandomSource, bands: readonly ScoreBand[]): number {
  const band = selectBand(bands, random());
  const sample = normalSample(random, band.mean, band.stddev);
  const clamped = Math.min(Math.max(sample, band.min), band.max);
  return Math.round(clamped);
}

// ============================================================================
// CONFIG VALIDATION
// ============================================================================

function assertPool(name: string, pool: readonly string[]): void {
  if (pool.length === 0) {
    throw new ConfigurationError(`Name pool '${name}' must not be empty.`);
  }
  if (pool.some(n => n.trim().length === 0)) {
    throw new ConfigurationError(`Name pool '${name}' contains an empty name.`);
  }
  const padded = pool.find(n => n !== n.trim());
  if (padded !== undefined) {
    throw new ConfigurationError(`Name pool '${name}' has surrounding whitespace in '${padded}'.`);
  }
}

export function validateGeneratorConfig(config: GeneratorConfig): void {
  assertPool('maleNames', config.maleNames);
  assertPool('femaleNames', config.femaleNames);
  assertPool('surnames', config.surnames);

  if (config.terms.length === 0 || config.terms.some(t => t.trim().length === 0)) {
    throw new ConfigurationError('Term list must contain at least one non-empty term.');
  }
  const paddedTerm = config.terms.find(t => t !== t.trim());
  if (paddedTerm !== undefined) {
    throw new ConfigurationError(`Term '${paddedTerm}' has surrounding whitespace.`);
  }

  const bands = config.scoreDistribution;
  if (bands.length === 0) {
    throw new ConfigurationError('Score distribution must have at least one band.');
  }
  let previous = 0;
  for (const [i, band] of bands.entries()) {
    if (!(band.upperBound > previous && band.upperBound <= 1)) {
      throw new ConfigurationError(
        `Score band ${i + 1}: upper bound ${band.upperBound} must be above ${previous} and at most 1.`
      );
    }
    if (!(band.min >= MIN_SCORE && band.min <= band.max && band.max <= MAX_SCORE)) {
      throw new ConfigurationError(
        `Score band ${i + 1}: clamp range ${band.min}-${band.max} must lie within ${MIN_SCORE}-${MAX_SCORE}.`
      );
    }
    if (!(band.stddev >= 0)) {
      throw new ConfigurationError(`Score band ${i + 1}: stddev must not be negative.`);
    }
    previous = band.upperBound;
  }
  if (previous !== 1) {
    throw new ConfigurationError(`Score distribution must end at 1, ends at ${previous}.`);
  }

  for (const grade of GRADES_DESCENDING) {
    const threshold = config.gradeThresholds[grade];
    if (!(threshold >= MIN_SCORE && threshold <= MAX_SCORE)) {
      throw new ConfigurationError(`Grade ${grade} threshold ${threshold} must lie within ${MIN_SCORE}-${MAX_SCORE}.`);
    }
  }
}

// ============================================================================
// PUBLIC API
// ============================================================================

export interface GenerateOptions {
  /** Also write the dataset as CSV here and record it as provenance */
  savePath?: string;
}

export interface Generator {
  readonly config: GeneratorConfig;
  /** Upper bound on records with pairwise distinct full names */
  readonly maxUniqueNames: number;
  generate(count: number, options?: GenerateOptions): Dataset;
}

/**
 * Create a generator. The configuration is checked up front so a bad config
 * fails here rather than mid-generation.
 */
export function createGenerator(
  config: GeneratorConfig = defaultGeneratorConfig(),
  random: RandomSource = Math.random
): Generator {
  validateGeneratorConfig(config);

  const maxUniqueNames =
    (config.maleNames.length + config.femaleNames.length) * config.surnames.length;

  function drawUniqueName(studentId: number, used: Set<string>): [string, string] {
    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
      const pool = random() < 0.5 ? config.maleNames : config.femaleNames;
      const firstName = pick(random, pool);
      const lastName = pick(random, config.surnames);
      const full = `${firstName} ${lastName}`;
      if (!used.has(full)) {
        used.add(full);
        return [firstName, lastName];
      }
    }
    throw new GenerationExhaustedError(studentId, MAX_NAME_ATTEMPTS);
  }

  return {
    config,
    maxUniqueNames,

    generate(count: number, options: GenerateOptions = {}): Dataset {
      if (!Number.isInteger(count) || count < 1) {
        throw new ConfigurationError(`Record count must be a positive integer, got ${count}.`);
      }
      if (count > maxUniqueNames) {
        throw new ConfigurationError(
          `Record count (${count}) exceeds the number of unique name combinations (${maxUniqueNames}).`
        );
      }

      const used = new Set<string>();
      const records: StudentRecord[] = [];

      for (let studentId = 1; studentId <= count; studentId++) {
        const [firstName, lastName] = drawUniqueName(studentId, used);
        const term = pick(random, config.terms);
        const score = drawScore(random, config.scoreDistribution);
        records.push({
          studentId,
          firstName,
          lastName,
          term,
          score,
          grade: scoreToGrade(score, config.gradeThresholds),
        });
      }

      if (options.savePath === undefined) {
        return Dataset.fromRecords(records);
      }

      const dataset = Dataset.fromRecords(records, options.savePath);
      writeCsv(options.savePath, dataset);
      return dataset;
    },
  };
}
