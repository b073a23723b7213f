import chalk from 'chalk';
import ora from 'ora';
import {
  ConfigError,
  analyzeDirectory,
  applyOverrides,
  createStderrLogger,
  formatReport,
  formatResults,
  isOutputFormat,
  loadConfig,
  type AnalysisReport,
  type Logger,
  type OutputFormat,
  type ToprankConfig,
} from '@toprank/parser';
import { writeRanking } from './output.js';
import { formatDuration, formatFileCount, formatMemberCount, handleCommandError } from './utils.js';

/**
 * Options as commander hands them over. Numbers arrive as strings.
 */
export interface RankCommandOptions {
  limit?: string;
  concurrency?: string;
  format: string;
  config?: string;
  /** true when --recursive is given */
  recursive?: boolean;
  includeCompound?: boolean;
  strictParse?: boolean;
  verbose?: boolean;
}

export interface RankOutputs {
  statementsOut?: string;
  nestingOut?: string;
}

export interface RankIO {
  /** Receives everything meant for stdout */
  stdout: (text: string) => void;
  logger: Logger;
  onProgress?: (done: number, total: number) => void;
}

/** Validate --format option */
function validateFormat(format: string): OutputFormat {
  if (!isOutputFormat(format)) {
    throw new ConfigError(`Invalid --format value "${format}". Must be one of: text, json`);
  }
  return format;
}

/** Parse a numeric flag; undefined when the flag was not given */
function parsePositiveInt(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new ConfigError(`Invalid ${flag} value "${value}". Must be a positive integer`);
  }
  return parsed;
}

/**
 * Config file values with the command-line flags layered on top
 */
export function resolveConfig(root: string, options: RankCommandOptions): ToprankConfig {
  const limit = parsePositiveInt('--limit', options.limit);
  const concurrency = parsePositiveInt('--concurrency', options.concurrency);

  return applyOverrides(loadConfig(root, options.config), {
    limit,
    concurrency,
    recursive: options.recursive ? true : undefined,
    strictParse: options.strictParse ? true : undefined,
    includeCompound: options.includeCompound ? true : undefined,
  });
}

/**
 * Analyze `root` and deliver both rankings.
 *
 * Each ranking goes to its output path when one is given. Rankings without a
 * path are printed to stdout; with no paths at all both are printed under
 * headings.
 */
export async function runRank(
  root: string,
  outputs: RankOutputs,
  options: RankCommandOptions,
  io: RankIO,
): Promise<AnalysisReport> {
  const format = validateFormat(options.format);
  const config = resolveConfig(root, options);
  io.logger.debug(`Using limit ${config.limit}, concurrency ${config.concurrency}`);

  const report = await analyzeDirectory(root, {
    limit: config.limit,
    concurrency: config.concurrency,
    recursive: config.recursive,
    exclude: config.exclude,
    strictParse: config.strictParse,
    includeCompound: config.statements.includeCompound,
    logger: io.logger,
    onProgress: io.onProgress,
  });

  const { statementsOut, nestingOut } = outputs;
  if (!statementsOut && !nestingOut) {
    io.stdout(formatReport(report, format));
    return report;
  }

  if (statementsOut) {
    await writeRanking(statementsOut, formatResults(report.statements, format));
    io.logger.debug(`Wrote statement ranking to ${statementsOut}`);
  } else {
    io.stdout(formatResults(report.statements, format));
  }

  if (nestingOut) {
    await writeRanking(nestingOut, formatResults(report.nesting, format));
    io.logger.debug(`Wrote nesting ranking to ${nestingOut}`);
  } else {
    io.stdout(formatResults(report.nesting, format));
  }

  return report;
}

/**
 * `toprank <root> [statementsOut] [nestingOut]`
 */
export async function rankCommand(
  root: string,
  statementsOut: string | undefined,
  nestingOut: string | undefined,
  options: RankCommandOptions,
): Promise<void> {
  const verbose = options.verbose ?? false;
  const logger = createStderrLogger({ verbose });
  const spinner = ora({ text: 'Scanning for C# files...', stream: process.stderr }).start();
  const startTime = Date.now();

  try {
    const report = await runRank(
      root,
      { statementsOut, nestingOut },
      options,
      {
        stdout: text => process.stdout.write(text),
        logger,
        onProgress: (done, total) => {
          spinner.text = `Analyzing ${done}/${formatFileCount(total)}...`;
        },
      },
    );

    spinner.succeed(
      `Ranked ${formatMemberCount(report.candidates)} from ${formatFileCount(report.filesParsed)} in ${formatDuration(Date.now() - startTime)}`,
    );
    if (report.failures.length > 0) {
      console.error(chalk.yellow(`Skipped ${formatFileCount(report.failures.length)} that could not be parsed`));
    }
  } catch (error) {
    spinner.fail('Ranking failed');
    handleCommandError(error, verbose);
    process.exit(1);
  }
}
