import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConfigError } from '@toprank/parser';
import { formatDuration, formatFileCount, formatMemberCount, handleCommandError } from './utils.js';

describe('formatDuration', () => {
  it('should format milliseconds below 1000', () => {
    expect(formatDuration(123)).toBe('123ms');
    expect(formatDuration(999)).toBe('999ms');
  });

  it('should format seconds for 1000ms and above', () => {
    expect(formatDuration(1000)).toBe('1.0s');
    expect(formatDuration(1500)).toBe('1.5s');
  });

  it('should handle zero', () => {
    expect(formatDuration(0)).toBe('0ms');
  });
});

describe('count formatting', () => {
  it('should pluralize file counts', () => {
    expect(formatFileCount(1)).toBe('1 file');
    expect(formatFileCount(0)).toBe('0 files');
    expect(formatFileCount(12)).toBe('12 files');
  });

  it('should pluralize member counts', () => {
    expect(formatMemberCount(1)).toBe('1 member');
    expect(formatMemberCount(3)).toBe('3 members');
  });
});

describe('handleCommandError', () => {
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function printed(): string {
    return consoleErrorSpy.mock.calls.map((call: unknown[]) => String(call[0])).join('\n');
  }

  it('should show a clean message for toprank errors', () => {
    handleCommandError(new ConfigError('Config file not found: /x.yml', { path: '/x.yml' }));

    expect(printed()).toContain('Config file not found: /x.yml');
    expect(printed()).not.toContain('Unexpected error');
    expect(printed()).toContain('Run with --verbose for more details');
  });

  it('should show context in verbose mode', () => {
    handleCommandError(new ConfigError('Bad config', { path: '/x.yml' }), true);

    expect(printed()).toContain('"path": "/x.yml"');
    expect(printed()).not.toContain('Run with --verbose');
  });

  it('should flag other errors as unexpected', () => {
    handleCommandError(new Error('boom'), true);

    expect(printed()).toContain('Unexpected error: boom');
    expect(printed()).toContain('Stack trace:');
  });
});
