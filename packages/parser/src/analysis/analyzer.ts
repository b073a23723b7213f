import path from 'path';
import pLimit from 'p-limit';
import { parseFile } from '../ast/source.js';
import { extractFunctions } from '../ast/functions.js';
import { getMetric } from '../ast/metrics/index.js';
import { assertValidLimit, rankResults, scoreCandidates } from '../ranking/ranker.js';
import type { ScoredResult } from '../ranking/types.js';
import { scanSourceFiles } from '../scanner.js';
import { DEFAULT_CONCURRENCY, DEFAULT_LIMIT } from '../constants.js';
import { silentLogger } from '../logger.js';
import type { ParseError } from '../errors/index.js';
import { Ok, partitionResults, type Result } from '../utils/result.js';
import type { AnalysisReport, AnalyzeOptions, FileAnalysis } from './types.js';

/**
 * Parse one file and score its candidates by both metrics.
 * A file that cannot be read or parsed comes back as Err.
 */
export async function analyzeFile(
  file: string,
  options: Pick<AnalyzeOptions, 'strictParse' | 'includeCompound'> = {},
): Promise<Result<FileAnalysis, ParseError>> {
  const parsed = await parseFile(file, { strict: options.strictParse });
  if (!parsed.ok) return parsed;

  const candidates = extractFunctions(parsed.value.root);
  const statementMetric = getMetric('statements', {
    statements: { includeCompound: options.includeCompound },
  });

  return Ok({
    file,
    candidates: candidates.length,
    statements: scoreCandidates(candidates, statementMetric),
    nesting: scoreCandidates(candidates, getMetric('nesting')),
  });
}

/**
 * Rank every function-like member under `rootDir` by statement count and by
 * nesting depth.
 *
 * Files are analyzed independently by a bounded pool. Per-file results are
 * only merged once every file has finished, and the merged lists are then
 * sorted, so the output does not depend on completion order.
 *
 * @throws InvalidPathError when rootDir cannot be scanned
 */
export async function analyzeDirectory(
  rootDir: string,
  options: AnalyzeOptions = {},
): Promise<AnalysisReport> {
  const logger = options.logger ?? silentLogger;
  const limitCount = options.limit ?? DEFAULT_LIMIT;
  const resolvedRoot = path.resolve(rootDir);
  assertValidLimit(limitCount);

  const files = await scanSourceFiles({
    rootDir: resolvedRoot,
    recursive: options.recursive,
    exclude: options.exclude,
  });
  logger.debug(`Found ${files.length} source files under ${resolvedRoot}`);

  const limit = pLimit(options.concurrency ?? DEFAULT_CONCURRENCY);
  let done = 0;
  const outcomes = await Promise.all(
    files.map(file =>
      limit(async () => {
        const outcome = await analyzeFile(file, options);
        done++;
        options.onProgress?.(done, files.length);
        return outcome;
      }),
    ),
  );

  const { values: analyses, errors } = partitionResults(outcomes);
  for (const error of errors) {
    logger.warning(`Skipping ${path.relative(resolvedRoot, error.file)}: ${error.message}`);
  }

  const statements: ScoredResult[] = analyses.flatMap(a => a.statements);
  const nesting: ScoredResult[] = analyses.flatMap(a => a.nesting);

  return {
    rootDir: resolvedRoot,
    filesScanned: files.length,
    filesParsed: analyses.length,
    candidates: analyses.reduce((sum, a) => sum + a.candidates, 0),
    failures: errors.map(error => ({ file: error.file, error })),
    statements: rankResults(statements, limitCount),
    nesting: rankResults(nesting, limitCount),
  };
}

/**
 * Top `limit` members under `rootPath` by statement count.
 */
export async function rankByStatementCount(
  rootPath: string,
  limit: number = DEFAULT_LIMIT,
  options: Omit<AnalyzeOptions, 'limit'> = {},
): Promise<ScoredResult[]> {
  const report = await analyzeDirectory(rootPath, { ...options, limit });
  return report.statements;
}

/**
 * Top `limit` members under `rootPath` by maximum nesting depth.
 */
export async function rankByNestingDepth(
  rootPath: string,
  limit: number = DEFAULT_LIMIT,
  options: Omit<AnalyzeOptions, 'limit'> = {},
): Promise<ScoredResult[]> {
  const report = await analyzeDirectory(rootPath, { ...options, limit });
  return report.nesting;
}
