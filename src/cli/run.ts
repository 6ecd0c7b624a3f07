/**
 * Run a CLI command with a spinner and formatted output
 */

import chalk from 'chalk';
import ora from 'ora';
import { formatResult, parseFormat, type CommandResult } from './format.js';

export type RunOptions = {
  format: string;
  time?: boolean;
};

export function runCommand(
  label: string,
  compute: () => CommandResult,
  options: RunOptions
): void {
  const spinner = ora(`${label}...`).start();

  try {
    const format = parseFormat(options.format);
    const startTime = performance.now();
    const result = compute();
    const elapsedMs = performance.now() - startTime;

    spinner.stop();
    console.log(formatResult(result, format));

    if (options.time) {
      console.error(chalk.gray(`\n${label} took ${elapsedMs.toFixed(2)}ms`));
    }
  } catch (error) {
    spinner.fail(`${label} failed`);
    const err = error instanceof Error ? error : new Error(String(error));
    console.error(chalk.red(`\n${err.message}\n`));
    process.exit(1);
  }
}
