import { parseArgs } from 'node:util';
import dotenv from 'dotenv';
import { loadConfig } from '../src/lib/config';
import { applyFilters, hasActiveFilters, type ViewFilters } from '../src/lib/filters';
import { loadDataset } from '../src/lib/loader';
import { createLogger } from '../src/lib/logger';
import { validateNumberParam, validateQueryParam } from '../src/lib/validation';

dotenv.config();

const log = createLogger('inspect');

function parseFilters(values: {
  term?: string;
  grade?: string;
  min?: string;
  max?: string;
  query?: string;
  fuzzy?: boolean;
}): ViewFilters {
  const filters: ViewFilters = { fuzzy: values.fuzzy ?? false };

  if (values.term !== undefined) {
    filters.term = values.term;
  }

  if (values.grade !== undefined) {
    const grade = validateNumberParam(values.grade, 1, 5, 'grade');
    if (!grade.valid) throw new Error(grade.error);
    filters.grade = grade.value;
  }

  if (values.min !== undefined || values.max !== undefined) {
    const min = validateNumberParam(values.min ?? '0', 0, 100, 'min');
    if (!min.valid) throw new Error(min.error);
    const max = validateNumberParam(values.max ?? '100', 0, 100, 'max');
    if (!max.valid) throw new Error(max.error);
    filters.scoreRange = { min: min.value ?? 0, max: max.value ?? 100 };
  }

  const query = validateQueryParam(values.query);
  if (!query.valid) throw new Error(query.error);
  filters.query = query.value;

  return filters;
}

/**
 * Usage: tsx scripts/inspect.ts [file.csv] [--term T] [--grade G]
 *          [--min N] [--max N] [--query Q] [--fuzzy]
 *
 * Prints statistics for the (filtered) dataset as JSON on stdout.
 */
function inspect(argv: string[]): void {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      term: { type: 'string' },
      grade: { type: 'string' },
      min: { type: 'string' },
      max: { type: 'string' },
      query: { type: 'string', short: 'q' },
      fuzzy: { type: 'boolean' },
    },
  });

  const filePath = positionals[0] ?? loadConfig().defaultCsvPath;
  const filters = parseFilters(values);

  const dataset = loadDataset(filePath);
  log.info(`Loaded ${dataset.recordCount()} records from ${filePath}`);

  const view = applyFilters(dataset, filters);
  if (hasActiveFilters(filters)) {
    log.info(`Filtered: ${view.recordCount()} of ${dataset.recordCount()} records`);
  }

  const output = {
    source: filePath,
    terms: dataset.terms(),
    statistics: view.statistics(),
  };
  process.stdout.write(JSON.stringify(output, null, 2) + '\n');
}

try {
  inspect(process.argv.slice(2));
} catch (err) {
  log.error('Inspection failed', err);
  process.exitCode = 1;
}
