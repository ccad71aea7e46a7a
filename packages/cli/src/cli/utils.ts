import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { isQuecatError, getErrorMessage, getErrorStack } from '@quecat/core';

/**
 * Standardized spinner wrapper for consistent UX across CLI commands.
 * Spinners write to stderr, so `--json` output on stdout stays clean.
 */
export class TaskSpinner {
  private spinner: Ora;

  constructor(initialText: string) {
    this.spinner = ora(initialText).start();
  }

  /**
   * Updates the spinner text while it's still spinning
   */
  update(text: string): void {
    this.spinner.text = text;
  }

  stop(): void {
    this.spinner.stop();
  }

  succeed(text: string): void {
    this.spinner.succeed(text);
  }

  /**
   * Shows failure message and stops spinner
   */
  fail(text: string): void {
    this.spinner.fail(text);
  }
}

/**
 * Handles command errors with consistent formatting.
 * Known errors get a clean message, anything else the full details.
 */
export function handleCommandError(error: unknown, verbose: boolean = false): void {
  const errorMessage = getErrorMessage(error);

  if (isQuecatError(error)) {
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
 * @returns Formatted duration string (e.g., "1.5s", "123ms")
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * @returns e.g. "1 category", "9 categories"
 */
export function formatCategoryCount(count: number): string {
  return `${count} ${count === 1 ? 'category' : 'categories'}`;
}
