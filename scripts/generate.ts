import dotenv from 'dotenv';
import { loadConfig, defaultGeneratorConfig } from '../src/lib/config';
import { createGenerator } from '../src/lib/generator';
import { createLogger } from '../src/lib/logger';
import { validateNumberParam } from '../src/lib/validation';

dotenv.config();

const log = createLogger('generate');

/**
 * Usage: tsx scripts/generate.ts [count] [output.csv]
 */
function generate(argv: string[]): void {
  const config = loadConfig();
  const [countArg, pathArg] = argv;

  let count = config.defaultStudentCount;
  if (countArg !== undefined) {
    const parsed = validateNumberParam(countArg, 1, config.maxStudentCount, 'count');
    if (!parsed.valid) {
      throw new Error(parsed.error);
    }
    count = parsed.value ?? count;
  }
  const savePath = pathArg ?? config.defaultCsvPath;

  log.info(`Generating ${count} records...`, { terms: config.examTerms.join(',') });

  const generator = createGenerator(defaultGeneratorConfig(config.examTerms));
  const dataset = generator.generate(count, { savePath });
  const stats = dataset.statistics();

  log.info(`Wrote ${dataset.recordCount()} records to ${savePath}`, {
    meanScore: Number(stats.meanScore.toFixed(2)),
    passRate: Number(stats.passRate.toFixed(1)),
    gradeDistribution: stats.gradeDistribution,
  });
}

try {
  generate(process.argv.slice(2));
} catch (err) {
  log.error('Generation failed', err);
  process.exitCode = 1;
}
