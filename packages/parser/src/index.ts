// @toprank/parser - C# parsing, member extraction, complexity metrics and ranking

// =============================================================================
// SYNTAX MODEL
// =============================================================================

export {
  SYNTAX_KINDS,
  STATEMENT_KINDS,
  COMPOUND_STATEMENT_KINDS,
  TYPE_DECLARATION_KINDS,
  createNode,
  descendants,
  isStatementKind,
  isNonBlockStatement,
} from './ast/syntax.js';
export type { SyntaxKind, SyntaxNode, SyntaxView, SourceLocation } from './ast/syntax.js';

// =============================================================================
// PARSING
// =============================================================================

export { parseSource, parseFile } from './ast/source.js';
export type { ParseOptions } from './ast/source.js';
export { parseAST } from './ast/parser.js';
export { toSyntaxView } from './ast/adapter.js';
export {
  detectLanguage,
  getLanguage,
  getSupportedExtensions,
  isSourceFile,
} from './ast/languages/registry.js';
export type { SupportedLanguage } from './ast/languages/registry.js';

// =============================================================================
// EXTRACTION & METRICS
// =============================================================================

export { extractFunctions, hasExecutableBody } from './ast/functions.js';
export {
  METRIC_TYPES,
  NESTING_ENLARGER_KINDS,
  countStatements,
  getMetric,
  nestingDepth,
} from './ast/metrics/index.js';
export type { Metric, MetricOptions, MetricType, StatementCountOptions } from './ast/metrics/index.js';

// =============================================================================
// RANKING
// =============================================================================

export { compareResults, rankResults, scoreCandidates } from './ranking/ranker.js';
export type { ScoredResult } from './ranking/types.js';

// =============================================================================
// ANALYSIS
// =============================================================================

export { scanSourceFiles } from './scanner.js';
export type { ScanOptions } from './scanner.js';
export {
  analyzeDirectory,
  analyzeFile,
  rankByNestingDepth,
  rankByStatementCount,
} from './analysis/analyzer.js';
export type { AnalysisReport, AnalyzeOptions, FileAnalysis, FileFailure } from './analysis/types.js';

// =============================================================================
// OUTPUT
// =============================================================================

export {
  OUTPUT_FORMATS,
  formatReport,
  formatResults,
  formatJsonReport,
  formatJsonResults,
  formatTextReport,
  formatTextResults,
  isOutputFormat,
} from './formatters/index.js';
export type { OutputFormat } from './formatters/index.js';

// =============================================================================
// CONFIG, ERRORS, LOGGING
// =============================================================================

export { loadConfig, applyOverrides, defaultConfig } from './config.js';
export type { ToprankConfig, ConfigOverrides } from './config.js';
export { DEFAULT_LIMIT, DEFAULT_CONCURRENCY, CONFIG_FILENAME } from './constants.js';
export {
  ToprankError,
  ToprankErrorCode,
  ConfigError,
  ParseError,
  InvalidPathError,
  OutputError,
  wrapError,
  isToprankError,
  getErrorMessage,
  getErrorStack,
} from './errors/index.js';
export type { ErrorSeverity } from './errors/index.js';
export { Ok, Err, isOk, isErr, partitionResults } from './utils/result.js';
export type { Result } from './utils/result.js';
export { consoleLogger, silentLogger, createStderrLogger } from './logger.js';
export type { Logger } from './logger.js';
