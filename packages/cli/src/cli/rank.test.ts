import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConfigError, InvalidPathError, OutputError, silentLogger } from '@toprank/parser';

// Mock ora
vi.mock('ora', () => {
  const mockSpinner = {
    start: vi.fn().mockReturnThis(),
    stop: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    text: '',
  };
  return {
    default: vi.fn(() => mockSpinner),
  };
});

import { rankCommand, resolveConfig, runRank, type RankCommandOptions } from './rank.js';

const ALPHA = 'class Alpha { void Big() { var a = 1; a++; a--; } }\n';

const BETA = [
  'class Beta',
  '{',
  '    void Deep()',
  '    {',
  '        if (x) { while (y) { Run(); } }',
  '    }',
  '    void Small() { Run(); }',
  '}',
  '',
].join('\n');

const STATEMENTS_TEXT = '3\tAlpha.cs:1\n1\tBeta.cs:3\n1\tBeta.cs:7\n';
const NESTING_TEXT = '2\tBeta.cs:3\n0\tAlpha.cs:1\n0\tBeta.cs:7\n';

describe('runRank', () => {
  let root: string;
  let out: string;
  let printed: string[];

  const defaults: RankCommandOptions = { format: 'text' };

  function run(outputs: { statementsOut?: string; nestingOut?: string }, options: Partial<RankCommandOptions> = {}) {
    return runRank(root, outputs, { ...defaults, ...options }, {
      stdout: text => printed.push(text),
      logger: silentLogger,
    });
  }

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'toprank-cli-'));
    out = await fs.mkdtemp(path.join(os.tmpdir(), 'toprank-out-'));
    await fs.writeFile(path.join(root, 'Alpha.cs'), ALPHA, 'utf-8');
    await fs.writeFile(path.join(root, 'Beta.cs'), BETA, 'utf-8');
    printed = [];
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
    await fs.rm(out, { recursive: true, force: true });
  });

  it('should print both rankings under headings when no paths are given', async () => {
    await run({});

    expect(printed).toEqual([
      `Statements (top 3):\n${STATEMENTS_TEXT}\nNesting (top 3):\n${NESTING_TEXT}`,
    ]);
  });

  it('should write each ranking to its own file', async () => {
    const statementsOut = path.join(out, 'statements.txt');
    const nestingOut = path.join(out, 'nesting.txt');

    await run({ statementsOut, nestingOut });

    expect(await fs.readFile(statementsOut, 'utf-8')).toBe(STATEMENTS_TEXT);
    expect(await fs.readFile(nestingOut, 'utf-8')).toBe(NESTING_TEXT);
    expect(printed).toEqual([]);
  });

  it('should print the ranking that has no path', async () => {
    const statementsOut = path.join(out, 'statements.txt');

    await run({ statementsOut });

    expect(await fs.readFile(statementsOut, 'utf-8')).toBe(STATEMENTS_TEXT);
    expect(printed).toEqual([NESTING_TEXT]);
  });

  it('should replace an existing output file', async () => {
    const statementsOut = path.join(out, 'statements.txt');
    await fs.writeFile(statementsOut, 'stale\nstale\nstale\nstale\n', 'utf-8');

    await run({ statementsOut, nestingOut: path.join(out, 'nesting.txt') }, { limit: '1' });

    expect(await fs.readFile(statementsOut, 'utf-8')).toBe('3\tAlpha.cs:1\n');
  });

  it('should write JSON when asked', async () => {
    await run({ statementsOut: path.join(out, 's.json'), nestingOut: path.join(out, 'n.json') }, { format: 'json' });

    const nesting = JSON.parse(await fs.readFile(path.join(out, 'n.json'), 'utf-8'));
    expect(nesting[0]).toEqual({ file: 'Beta.cs', line: 3, value: 2 });
  });

  it('should take the limit from .toprank.yml unless overridden', async () => {
    await fs.writeFile(path.join(root, '.toprank.yml'), 'limit: 2\n', 'utf-8');

    const fromFile = await run({});
    const fromFlag = await run({}, { limit: '1' });

    expect(fromFile.statements).toHaveLength(2);
    expect(fromFlag.statements).toHaveLength(1);
  });

  it('should only scan subdirectories with --recursive', async () => {
    await fs.mkdir(path.join(root, 'nested'));
    await fs.writeFile(path.join(root, 'nested', 'Gamma.cs'), ALPHA.replace('Alpha', 'Gamma'), 'utf-8');

    const flat = await run({});
    const recursive = await run({}, { recursive: true });

    expect(recursive.filesScanned).toBe(3);
    expect(flat.filesScanned).toBe(2);
  });

  it('should count compound statements with --include-compound', async () => {
    const report = await run({}, { includeCompound: true });
    expect(report.statements.map(r => r.value)).toEqual([3, 3, 1]);
  });

  it('should reject an unknown format', async () => {
    await expect(run({}, { format: 'xml' })).rejects.toThrow(
      'Invalid --format value "xml". Must be one of: text, json',
    );
  });

  it('should reject a missing root', async () => {
    await expect(runRank(path.join(root, 'missing'), {}, defaults, { stdout: () => {}, logger: silentLogger })).rejects.toBeInstanceOf(
      InvalidPathError,
    );
  });

  it('should report an output file that cannot be written', async () => {
    const statementsOut = path.join(out, 'no-such-dir', 'statements.txt');
    await expect(run({ statementsOut })).rejects.toBeInstanceOf(OutputError);
  });
});

describe('resolveConfig', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'toprank-config-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should use defaults when nothing is configured', () => {
    const config = resolveConfig(root, { format: 'text' });

    expect(config.limit).toBe(100);
    expect(config.recursive).toBe(false);
    expect(config.statements.includeCompound).toBe(false);
  });

  it('should reject malformed numeric flags', () => {
    for (const value of ['0', '-3', 'abc', '2.5']) {
      expect(() => resolveConfig(root, { format: 'text', limit: value })).toThrow(ConfigError);
    }
    expect(() => resolveConfig(root, { format: 'text', concurrency: '0' })).toThrow(
      'Invalid --concurrency value "0". Must be a positive integer',
    );
  });
});

describe('rankCommand', () => {
  let root: string;

  function spyOnProcess() {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    return {
      stdout: vi.spyOn(process.stdout, 'write').mockImplementation(() => true),
      exit: vi.spyOn(process, 'exit').mockImplementation(code => {
        throw new Error(`process.exit(${code})`);
      }),
    };
  }

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'toprank-command-'));
    await fs.writeFile(path.join(root, 'Alpha.cs'), ALPHA, 'utf-8');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should print the rankings and exit normally', async () => {
    const spies = spyOnProcess();

    await rankCommand(root, undefined, undefined, { format: 'text' });

    expect(spies.exit).not.toHaveBeenCalled();
    expect(spies.stdout).toHaveBeenCalledWith(
      'Statements (top 1):\n3\tAlpha.cs:1\n\nNesting (top 1):\n0\tAlpha.cs:1\n',
    );
  });

  it('should exit 1 when the root cannot be scanned', async () => {
    const spies = spyOnProcess();

    await expect(
      rankCommand(path.join(root, 'missing'), undefined, undefined, { format: 'text' }),
    ).rejects.toThrow('process.exit(1)');
    expect(spies.stdout).not.toHaveBeenCalled();
  });

  it('should exit 1 on invalid options', async () => {
    spyOnProcess();

    await expect(rankCommand(root, undefined, undefined, { format: 'text', limit: 'many' })).rejects.toThrow(
      'process.exit(1)',
    );
  });
});
