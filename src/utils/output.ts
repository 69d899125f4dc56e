/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(
  result: CommandResult<T>,
  format: OutputFormat
): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print a status table
 */
export function printStatus(
  title: string,
  status: Record<string, unknown>,
  format: OutputFormat
): void {
  if (format === 'json') {
    console.log(JSON.stringify(status, null, 2));
    return;
  }

  console.log(chalk.bold(`\n${title}:\n`));
  for (const [key, value] of Object.entries(status)) {
    const label = formatLabel(key);
    console.log(`  ${chalk.gray(label + ':')} ${formatValue(value)}`);
  }
}

/**
 * Print a block of pre-formatted lines, colouring the leading marker
 */
export function printLines(text: string): void {
  for (const line of text.split('\n')) {
    console.log(colorLine(line));
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose/debug output should never go to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}

// Helper functions

function colorLine(line: string): string {
  const marker = line.trimStart().charAt(0);
  switch (marker) {
    case '+':
      return chalk.green(line);
    case '-':
      return chalk.red(line);
    case '~':
      return chalk.yellow(line);
    case '!':
      return chalk.yellow(line);
    case 'X':
      return chalk.red(line);
    default:
      return line;
  }
}

function formatValue(value: unknown): string {
  if (value === undefined || value === null) {
    return chalk.gray('(none)');
  }
  if (typeof value === 'string') {
    return value.length > 60 ? value.slice(0, 60) + '...' : value;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function formatLabel(key: string): string {
  // Convert camelCase to Title Case with spaces
  return key
    .replace(/([A-Z])/g, ' $1')
    .replace(/^./, (str) => str.toUpperCase())
    .trim();
}
