import { describe, it, expect } from 'vitest';
import { DEFAULT_CONCURRENCY, DEFAULT_LIMIT } from '@toprank/parser';
import { program } from './index.js';

function describeOption(long: string): string | undefined {
  return program.options.find(option => option.long === long)?.description;
}

describe('program', () => {
  it('should take the root and two optional output paths', () => {
    expect(program.name()).toBe('toprank');
    expect(program.registeredArguments.map(arg => [arg.name(), arg.required])).toEqual([
      ['root', true],
      ['statementsOut', false],
      ['nestingOut', false],
    ]);
  });

  it('should show the shared defaults in option help', () => {
    expect(describeOption('--limit')).toBe(`Entries per ranking (default: ${DEFAULT_LIMIT})`);
    expect(describeOption('--concurrency')).toBe(`Files analyzed at once (default: ${DEFAULT_CONCURRENCY})`);
    expect(describeOption('--concurrency')).toBe('Files analyzed at once (default: 4)');
  });

  it('should make scanning subdirectories opt-in', () => {
    expect(describeOption('--recursive')).toBe('Also scan subdirectories of <root>');
    expect(describeOption('--no-recursive')).toBeUndefined();
  });
});
