import { glob } from 'glob';
import ignore from 'ignore';
import fs from 'fs/promises';
import path from 'path';
import { isSourceFile } from './ast/languages/registry.js';
import { InvalidPathError, getErrorMessage } from './errors/index.js';

export interface ScanOptions {
  rootDir: string;
  /** Descend into subdirectories (default: false, top level only) */
  recursive?: boolean;
  /** Gitignore-style patterns, relative to rootDir, for files to skip */
  exclude?: string[];
}

/**
 * Fail unless `dir` exists and is a directory.
 */
async function assertDirectory(dir: string): Promise<void> {
  const stat = await fs.stat(dir).catch((error: unknown) => {
    throw new InvalidPathError(`Cannot access ${dir}: ${getErrorMessage(error)}`, dir);
  });
  if (!stat.isDirectory()) {
    throw new InvalidPathError(`Not a directory: ${dir}`, dir);
  }
}

/**
 * Enumerate every regular file under the root.
 */
async function enumerateFiles(rootDir: string, recursive: boolean): Promise<string[]> {
  return glob(recursive ? '**/*' : '*', {
    cwd: rootDir,
    absolute: true,
    nodir: true,
    dot: true,
  });
}

/**
 * Find the source files to analyze under `rootDir`.
 *
 * Every regular file is enumerated, then narrowed to registered source
 * extensions and filtered through the exclude patterns. Paths are absolute
 * and sorted.
 *
 * @throws InvalidPathError when rootDir is missing or not a directory
 */
export async function scanSourceFiles(options: ScanOptions): Promise<string[]> {
  const rootDir = path.resolve(options.rootDir);
  await assertDirectory(rootDir);

  const ig = ignore().add(options.exclude ?? []);
  const files = await enumerateFiles(rootDir, options.recursive ?? false);

  return files
    .filter(isSourceFile)
    .filter(file => {
      // ignore expects posix-style relative paths
      const relativePath = path.relative(rootDir, file).split(path.sep).join('/');
      return !ig.ignores(relativePath);
    })
    .sort();
}
