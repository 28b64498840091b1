/**
 * Descriptive Statistics
 *
 * Fixed set of aggregates over exam records. Every function returns zeros for
 * empty input instead of NaN.
 */

import type { DatasetStatistics, StudentRecord, TermStatistics } from '../types';
import { hasPassed } from './record';

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let total = 0;
  for (const v of values) total += v;
  return total / values.length;
}

/**
 * Sample standard deviation (n - 1 denominator); 0 for fewer than two values
 */
export function sampleStdDev(values: readonly number[]): number {
  if (values.length <= 1) return 0;
  const avg = mean(values);
  let squares = 0;
  for (const v of values) squares += (v - avg) ** 2;
  return Math.sqrt(squares / (values.length - 1));
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = values.slice().sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1
    ? sorted[mid]
    : (sorted[mid - 1] + sorted[mid]) / 2;
}

export function passRate(records: readonly StudentRecord[]): number {
  if (records.length === 0) return 0;
  return (records.filter(hasPassed).length / records.length) * 100;
}

export function gradeDistribution(records: readonly StudentRecord[]): Record<number, number> {
  const counts = new Map<number, number>();
  for (const r of records) {
    counts.set(r.grade, (counts.get(r.grade) ?? 0) + 1);
  }
  return Object.fromEntries([...counts.entries()].sort((a, b) => a[0] - b[0]));
}

export function termStatistics(records: readonly StudentRecord[]): TermStatistics {
  return {
    count: records.length,
    meanScore: mean(records.map(r => r.score)),
    meanGrade: mean(records.map(r => r.grade)),
    passRate: passRate(records),
  };
}

/**
 * Groups records by term; keys come out lexicographically sorted
 */
export function groupByTerm(records: readonly StudentRecord[]): Map<string, StudentRecord[]> {
  const groups = new Map<string, StudentRecord[]>();
  for (const r of records) {
    const group = groups.get(r.term);
    if (group) {
      group.push(r);
    } else {
      groups.set(r.term, [r]);
    }
  }
  return new Map([...groups.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

export function computeStatistics(records: readonly StudentRecord[]): DatasetStatistics {
  if (records.length === 0) {
    return {
      count: 0,
      meanGrade: 0,
      meanScore: 0,
      stdScore: 0,
      minScore: 0,
      maxScore: 0,
      medianScore: 0,
      passRate: 0,
      passedCount: 0,
      failedCount: 0,
      gradeDistribution: {},
      termStats: {},
    };
  }

  const scores = records.map(r => r.score);
  const passedCount = records.filter(hasPassed).length;
  const termStats = [...groupByTerm(records).entries()].map(
    ([term, group]) => [term, termStatistics(group)] as const
  );

  return {
    count: records.length,
    meanGrade: mean(records.map(r => r.grade)),
    meanScore: mean(scores),
    stdScore: sampleStdDev(scores),
    minScore: scores.reduce((a, b) => Math.min(a, b)),
    maxScore: scores.reduce((a, b) => Math.max(a, b)),
    medianScore: median(scores),
    passRate: (passedCount / records.length) * 100,
    passedCount,
    failedCount: records.length - passedCount,
    gradeDistribution: gradeDistribution(records),
    termStats: Object.fromEntries(termStats),
  };
}
