/**
 * Output formatting for CLI results
 */

export type OutputFormat = 'list' | 'json';

export type CommandResult = number | boolean | number[] | number[][];

/**
 * Render a command result. `list` prints one value (or tuple) per line,
 * `json` prints the result as compact JSON.
 */
export function formatResult(result: CommandResult, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(result);
  }

  if (!Array.isArray(result)) {
    return String(result);
  }

  return result
    .map(entry => (Array.isArray(entry) ? entry.join(' ') : String(entry)))
    .join('\n');
}

/**
 * Validate the --format option
 */
export function parseFormat(value: string): OutputFormat {
  if (value !== 'list' && value !== 'json') {
    throw new Error(`Unknown format "${value}" (expected list or json)`);
  }
  return value;
}

/**
 * Parse a CLI argument as an integer, rejecting partial matches such as "12abc"
 */
export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new Error(`Not an integer: "${value}"`);
  }
  return Number(value);
}
