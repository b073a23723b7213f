import type { ScoredResult } from '../ranking/types.js';
import type { AnalysisReport } from '../analysis/types.js';

export function formatJsonResults(results: readonly ScoredResult[]): string {
  return JSON.stringify(results, null, 2) + '\n';
}

/**
 * Full report as JSON. Failures are reduced to file, code and message.
 */
export function formatJsonReport(report: AnalysisReport): string {
  const serializable = {
    ...report,
    failures: report.failures.map(({ file, error }) => ({
      file,
      code: error.code,
      message: error.message,
    })),
  };
  return JSON.stringify(serializable, null, 2) + '\n';
}
