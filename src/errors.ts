/**
 * Custom error classes for primeseq.
 * Every error carries a list of suggested fixes, also appended to its message.
 */

function formatMessage(message: string, suggestions: string[]): string {
  return `${message}\n\nSuggested fixes:\n${suggestions.map(s => `  • ${s}`).join('\n')}`;
}

/**
 * Error thrown when a caller breaks an operation's precondition.
 *
 * Common causes:
 * - Negative or fractional bound passed to primesUpTo or compositesUpTo
 * - nthPrime called with n < 1
 * - nextPrime called with an empty list
 *
 * Known-primes hints are never validated, so a malformed hint does not raise this.
 */
export class PreconditionError extends Error {
  public readonly suggestions: string[];

  constructor(message: string, suggestions?: string[]) {
    const suggestionList = suggestions || PreconditionError.getDefaultSuggestions();
    super(formatMessage(message, suggestionList));
    this.name = 'PreconditionError';
    this.suggestions = suggestionList;
    Object.setPrototypeOf(this, PreconditionError.prototype);
  }

  private static getDefaultSuggestions(): string[] {
    return [
      'Pass a non-negative integer (e.g., Math.floor(x) for computed values)',
      'Use n >= 1 for ordinal queries such as nthPrime',
    ];
  }
}

/**
 * Error thrown when a prime sequence is indexed with a negative or fractional index.
 *
 * The sequence is unbounded in the positive direction only, so there is no "last"
 * element for a negative index to count back from.
 */
export class SequenceIndexError extends Error {
  public readonly index: number;
  public readonly suggestions: string[];

  constructor(message: string, index: number, suggestions?: string[]) {
    const suggestionList = suggestions || SequenceIndexError.getDefaultSuggestions();
    super(formatMessage(message, suggestionList));
    this.name = 'SequenceIndexError';
    this.index = index;
    this.suggestions = suggestionList;
    Object.setPrototypeOf(this, SequenceIndexError.prototype);
  }

  private static getDefaultSuggestions(): string[] {
    return [
      'Use an index >= 0 (primes.get(0) is 2)',
      'Read primes.length for the number of primes cached so far',
    ];
  }
}

/**
 * Error thrown when a slice request cannot be resolved.
 *
 * Common causes:
 * - step is 0
 * - forward slice without a stop (it would never end)
 * - backward slice without a start
 * - negative or fractional start/stop
 */
export class SliceError extends Error {
  public readonly suggestions: string[];

  constructor(message: string, suggestions?: string[]) {
    const suggestionList = suggestions || SliceError.getDefaultSuggestions();
    super(formatMessage(message, suggestionList));
    this.name = 'SliceError';
    this.suggestions = suggestionList;
    Object.setPrototypeOf(this, SliceError.prototype);
  }

  private static getDefaultSuggestions(): string[] {
    return [
      'Give forward slices an explicit stop (e.g., { start: 0, stop: 10 })',
      'Give backward slices an explicit start (e.g., { start: 10, step: -1 })',
      'Use a non-zero step and non-negative start/stop',
    ];
  }
}

/**
 * Error thrown when environment configuration fails validation.
 */
export class ConfigError extends Error {
  public readonly issues: string[];
  public readonly suggestions: string[];

  constructor(message: string, issues: string[] = [], suggestions?: string[]) {
    const suggestionList = suggestions || ConfigError.getDefaultSuggestions();
    const details = issues.length > 0 ? `\n${issues.map(i => `  - ${i}`).join('\n')}` : '';
    super(formatMessage(`${message}${details}`, suggestionList));
    this.name = 'ConfigError';
    this.issues = issues;
    this.suggestions = suggestionList;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  private static getDefaultSuggestions(): string[] {
    return [
      'Check LOG_LEVEL is one of TRACE, DEBUG, INFO, WARN, ERROR, FATAL, SILENT',
      'PRIMES_GROWTH_FACTOR must be a number greater than 1',
      'PRIMES_INITIAL_BOUND must be an integer >= 2',
      'See .env.example for the supported variables',
    ];
  }
}
