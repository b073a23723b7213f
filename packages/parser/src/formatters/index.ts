import type { ScoredResult } from '../ranking/types.js';
import type { AnalysisReport } from '../analysis/types.js';
import { formatTextResults, formatTextReport } from './text.js';
import { formatJsonResults, formatJsonReport } from './json.js';

export const OUTPUT_FORMATS = ['text', 'json'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'text' || value === 'json';
}

/**
 * Format one ranking in the specified format
 */
export function formatResults(results: readonly ScoredResult[], format: OutputFormat): string {
  switch (format) {
    case 'json':
      return formatJsonResults(results);
    case 'text':
    default:
      return formatTextResults(results);
  }
}

/**
 * Format a whole analysis report in the specified format
 */
export function formatReport(report: AnalysisReport, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return formatJsonReport(report);
    case 'text':
    default:
      return formatTextReport(report);
  }
}

// Export individual formatters
export { formatTextResults, formatTextReport, formatJsonResults, formatJsonReport };
