import fs from 'fs';
import os from 'os';
import path from 'path';
import type { RandomSource } from '../generator';
import type { StudentRecord } from '../../types';

/**
 * Seeded PRNG (mulberry32) so generation tests are repeatable
 */
export function seededRandom(seed: number): RandomSource {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Replays the given values in order, then repeats the last one
 */
export function sequenceRandom(values: number[]): RandomSource {
  let i = 0;
  return () => {
    const value = values[Math.min(i, values.length - 1)];
    i++;
    return value;
  };
}

const tempDirs: string[] = [];

export function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'exam-results-'));
  tempDirs.push(dir);
  return dir;
}

/**
 * Removes every directory made by makeTempDir; register with afterEach
 */
export function removeTempDirs(): void {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

export function writeFile(dir: string, name: string, content: string | Buffer): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, content);
  return file;
}

export function record(
  studentId: number,
  firstName: string,
  lastName: string,
  term: string,
  score: number,
  grade: number
): StudentRecord {
  return { studentId, firstName, lastName, term, score, grade };
}

export const SAMPLE_RECORDS: StudentRecord[] = [
  record(1, 'Ana', 'Horvat', '2025-01', 92, 5),
  record(2, 'Marijana', 'Babić', '2025-06', 71, 3),
  record(3, 'Ivan', 'Perić', '2025-01', 40, 1),
  record(4, 'Luka', 'Novak', '2025-02', 55, 2),
  record(5, 'Petra', 'Jurić', '2025-06', 84, 4),
];

/**
 * Runs `fn` and returns what it threw; fails the test when nothing is thrown
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}
