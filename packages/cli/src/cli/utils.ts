import chalk from 'chalk';
import { isToprankError, getErrorMessage, getErrorStack } from '@toprank/parser';

/**
 * Handles command errors with consistent formatting.
 * Toprank errors get a clean one-line message; anything else is unexpected
 * and shows its stack in verbose mode.
 */
export function handleCommandError(error: unknown, verbose: boolean = false): void {
  const errorMessage = getErrorMessage(error);

  if (isToprankError(error)) {
    console.error(chalk.red(`\n❌ ${errorMessage}\n`));

    if (error.context && verbose) {
      console.error(chalk.dim('Context:'));
      console.error(chalk.dim(JSON.stringify(error.context, null, 2)));
    }
  } else {
    console.error(chalk.red(`\n❌ Unexpected error: ${errorMessage}\n`));

    const stack = getErrorStack(error);
    if (stack && verbose) {
      console.error(chalk.dim('Stack trace:'));
      console.error(chalk.dim(stack));
    }
  }

  if (!verbose) {
    console.error(chalk.dim('Run with --verbose for more details\n'));
  }
}

/**
 * Formats a duration in milliseconds to a human-readable string
 * (e.g. "1.5s", "123ms")
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}

export function formatFileCount(count: number): string {
  return `${count} file${count === 1 ? '' : 's'}`;
}

export function formatMemberCount(count: number): string {
  return `${count} member${count === 1 ? '' : 's'}`;
}
