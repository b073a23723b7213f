import path from 'path';
import type { SyntaxNode } from '../ast/syntax.js';
import type { Metric } from '../ast/metrics/index.js';
import { ToprankError, ToprankErrorCode } from '../errors/index.js';
import type { ScoredResult } from './types.js';

/**
 * Total order for rankings: value descending, then file name ascending
 * (ordinal, by UTF-16 code unit), then line ascending.
 */
export function compareResults(a: ScoredResult, b: ScoredResult): number {
  if (a.value !== b.value) {
    return b.value - a.value;
  }
  if (a.file !== b.file) {
    return a.file < b.file ? -1 : 1;
  }
  return a.line - b.line;
}

/**
 * Score each candidate with `metric`. The result keeps only the file's base
 * name and the candidate's start line, not the node.
 */
export function scoreCandidates(candidates: readonly SyntaxNode[], metric: Metric): ScoredResult[] {
  return candidates.map(candidate =>
    Object.freeze({
      file: path.basename(candidate.location.file),
      line: candidate.location.line,
      value: metric(candidate),
    }),
  );
}

/**
 * @throws ToprankError if limit is not a non-negative integer
 */
export function assertValidLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new ToprankError(
      `Invalid limit ${limit}: expected a non-negative integer`,
      ToprankErrorCode.INVALID_INPUT,
      { limit },
    );
  }
}

/**
 * Sort results into ranking order and keep the first `limit`.
 * Fewer results than `limit` is not an error; the input is not modified.
 */
export function rankResults(results: readonly ScoredResult[], limit: number): ScoredResult[] {
  assertValidLimit(limit);
  return [...results].sort(compareResults).slice(0, limit);
}
