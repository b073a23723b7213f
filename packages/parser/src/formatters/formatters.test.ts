import { describe, it, expect } from 'vitest';
import {
  formatJsonReport,
  formatJsonResults,
  formatReport,
  formatResults,
  formatTextReport,
  formatTextResults,
  isOutputFormat,
} from './index.js';
import type { AnalysisReport } from '../analysis/types.js';
import { ParseError } from '../errors/index.js';

const report: AnalysisReport = {
  rootDir: '/repo',
  filesScanned: 3,
  filesParsed: 2,
  candidates: 3,
  failures: [{ file: '/repo/Bad.cs', error: new ParseError('Failed to parse /repo/Bad.cs: boom', '/repo/Bad.cs') }],
  statements: [
    { file: 'a.src', line: 5, value: 7 },
    { file: 'b.src', line: 10, value: 7 },
  ],
  nesting: [{ file: 'a.src', line: 5, value: 2 }],
};

describe('text formatter', () => {
  it('should write one value<TAB>file:line per result', () => {
    expect(formatTextResults(report.statements)).toBe('7\ta.src:5\n7\tb.src:10\n');
  });

  it('should write nothing for an empty ranking', () => {
    expect(formatTextResults([])).toBe('');
  });

  it('should put both rankings under headings', () => {
    expect(formatTextReport(report)).toBe(
      'Statements (top 2):\n7\ta.src:5\n7\tb.src:10\n\nNesting (top 1):\n2\ta.src:5\n',
    );
  });
});

describe('json formatter', () => {
  it('should serialize results as an array', () => {
    expect(JSON.parse(formatJsonResults(report.nesting))).toEqual([{ file: 'a.src', line: 5, value: 2 }]);
    expect(formatJsonResults([])).toBe('[]\n');
  });

  it('should reduce failures to file, code and message', () => {
    const parsed = JSON.parse(formatJsonReport(report));

    expect(parsed.failures).toEqual([
      { file: '/repo/Bad.cs', code: 'PARSE_FAILED', message: 'Failed to parse /repo/Bad.cs: boom' },
    ]);
    expect(parsed.filesScanned).toBe(3);
    expect(parsed.statements).toHaveLength(2);
  });
});

describe('format dispatch', () => {
  it('should recognise the supported formats', () => {
    expect(isOutputFormat('text')).toBe(true);
    expect(isOutputFormat('json')).toBe(true);
    expect(isOutputFormat('csv')).toBe(false);
  });

  it('should pick the formatter by name', () => {
    expect(formatResults(report.statements, 'text')).toBe(formatTextResults(report.statements));
    expect(formatResults(report.statements, 'json')).toBe(formatJsonResults(report.statements));
    expect(formatReport(report, 'json')).toBe(formatJsonReport(report));
  });
});
