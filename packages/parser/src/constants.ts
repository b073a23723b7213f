/**
 * Centralized constants for @toprank/parser.
 */

// Ranking
export const DEFAULT_LIMIT = 100;

// Per-file analysis tasks running at once
export const DEFAULT_CONCURRENCY = 4;

// Config file looked up in the analyzed root
export const CONFIG_FILENAME = '.toprank.yml';
