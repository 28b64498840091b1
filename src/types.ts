export type Grade = 1 | 2 | 3 | 4 | 5;

export interface StudentRecord {
  readonly studentId: number;
  readonly firstName: string;
  readonly lastName: string;
  readonly term: string;
  readonly score: number; // 0-100
  readonly grade: number; // 1-5, stored as supplied
}

/** Column names of the logical schema, as written to and read from CSV. */
export type CanonicalField =
  | 'student_id'
  | 'first_name'
  | 'last_name'
  | 'term'
  | 'score'
  | 'grade';

export type CanonicalRow = Record<CanonicalField, string | number>;

export interface TermStatistics {
  count: number;
  meanScore: number;
  meanGrade: number;
  passRate: number;
}

export interface DatasetStatistics {
  count: number;
  meanGrade: number;
  meanScore: number;
  stdScore: number;
  minScore: number;
  maxScore: number;
  medianScore: number;
  passRate: number;
  passedCount: number;
  failedCount: number;
  gradeDistribution: Record<number, number>;
  termStats: Record<string, TermStatistics>;
}

/** (cumulative upper bound, mean, stddev, clamp min, clamp max) */
export interface ScoreBand {
  upperBound: number;
  mean: number;
  stddev: number;
  min: number;
  max: number;
}

export type GradeThresholds = Record<Grade, number>;

export interface GeneratorConfig {
  maleNames: readonly string[];
  femaleNames: readonly string[];
  surnames: readonly string[];
  terms: readonly string[];
  scoreDistribution: readonly ScoreBand[];
  gradeThresholds: GradeThresholds;
}

export type SortKey = 'studentId' | 'firstName' | 'lastName' | 'fullName' | 'term' | 'score' | 'grade';
export type SortDirection = 'asc' | 'desc';
