import type { ScoredResult } from '../ranking/types.js';
import type { AnalysisReport } from '../analysis/types.js';

/**
 * One line per result, `value<TAB>file:line`, in the given order.
 * No header; a trailing newline unless the list is empty.
 */
export function formatTextResults(results: readonly ScoredResult[]): string {
  if (results.length === 0) return '';
  return results.map(r => `${r.value}\t${r.file}:${r.line}`).join('\n') + '\n';
}

/**
 * Both rankings for terminal output, each under a heading.
 */
export function formatTextReport(report: AnalysisReport): string {
  const sections = [
    `Statements (top ${report.statements.length}):\n${formatTextResults(report.statements)}`,
    `Nesting (top ${report.nesting.length}):\n${formatTextResults(report.nesting)}`,
  ];
  return sections.join('\n');
}
