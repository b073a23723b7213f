import type { ScoredResult } from '../ranking/types.js';
import type { ParseError } from '../errors/index.js';
import type { Logger } from '../logger.js';

export interface AnalyzeOptions {
  /** Entries kept per ranking (default: 100) */
  limit?: number;
  /** Files analyzed at once (default: 4) */
  concurrency?: number;
  /** Descend into subdirectories (default: false) */
  recursive?: boolean;
  /** Gitignore-style patterns for files to skip */
  exclude?: string[];
  /** Drop files that only parse with error recovery */
  strictParse?: boolean;
  /** Count compound statements too */
  includeCompound?: boolean;
  logger?: Logger;
  /** Called after each file finishes */
  onProgress?: (done: number, total: number) => void;
}

/**
 * Both metric scores for every candidate in one file
 */
export interface FileAnalysis {
  file: string;
  candidates: number;
  statements: ScoredResult[];
  nesting: ScoredResult[];
}

export interface FileFailure {
  file: string;
  error: ParseError;
}

export interface AnalysisReport {
  rootDir: string;
  filesScanned: number;
  filesParsed: number;
  candidates: number;
  failures: FileFailure[];
  /** Top entries by statement count */
  statements: ScoredResult[];
  /** Top entries by nesting depth */
  nesting: ScoredResult[];
}
