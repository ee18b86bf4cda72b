import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { isCrapScoreError, getErrorMessage, getErrorStack } from '@crapscore/core';

/**
 * Standardized spinner wrapper for consistent UX across CLI commands.
 * Writes to stderr, so it never mixes with a report on stdout.
 */
export class TaskSpinner {
  private spinner: Ora;

  constructor(initialText: string) {
    this.spinner = ora({ text: initialText, stream: process.stderr }).start();
  }

  succeed(text: string): void {
    this.spinner.succeed(text);
  }

  fail(text: string): void {
    this.spinner.fail(text);
  }
}

/**
 * Handles command errors with consistent formatting.
 * Known errors print their message (and context with --verbose);
 * anything else is reported as unexpected, with its stack under --verbose.
 */
export function handleCommandError(error: unknown, verbose: boolean = false): void {
  const errorMessage = getErrorMessage(error);

  if (isCrapScoreError(error)) {
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
 * @returns e.g. "1.5s", "123ms"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Formats a file count with proper pluralization
 * @returns e.g. "1 file", "5 files"
 */
export function formatFileCount(count: number): string {
  return `${count} file${count === 1 ? '' : 's'}`;
}

// Option parsers for commander. Each throws InvalidArgumentError, which
// commander reports as "error: option '--x <n>' argument 'y' is invalid. ..."

export function parseNonNegativeNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.');
  }
  return parsed;
}

export function parseNonNegativeInteger(value: string): number {
  const parsed = parseNonNegativeNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function parsePositiveInteger(value: string): number {
  const parsed = parseNonNegativeInteger(value);
  if (parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Accumulator for repeatable options (`--exclude a --exclude b`).
 */
export function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}
