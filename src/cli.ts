#!/usr/bin/env node
/**
 * primeseq CLI - ad-hoc prime queries from the terminal
 */

import 'dotenv/config';
import { Command } from 'commander';
import { compositesUpTo, nPrimes, nthPrime } from './ordinal.js';
import { isPrime, nextPrime } from './primality.js';
import { primesUpTo } from './sieve.js';
import { twinPrimesUpTo } from './constellations.js';
import { parseInteger } from './cli/format.js';
import { runCommand, type RunOptions } from './cli/run.js';

const program = new Command();

program
  .name('primeseq')
  .description('Generate primes and answer prime queries')
  .version('1.0.0')
  .option('-f, --format <type>', 'Output format (list|json)', 'list')
  .option('--time', 'Print how long the computation took');

const globalOptions = (): RunOptions => program.opts<RunOptions>();

program
  .command('up-to <bound>')
  .description('List all primes up to and including bound')
  .action((bound: string) =>
    runCommand('Sieving', () => primesUpTo(parseInteger(bound)), globalOptions())
  );

program
  .command('first <n>')
  .description('List the first n primes')
  .action((n: string) =>
    runCommand('Sieving', () => nPrimes(parseInteger(n)), globalOptions())
  );

program
  .command('nth <n>')
  .description('Print the nth prime (nth 1 is 2)')
  .action((n: string) =>
    runCommand('Sieving', () => nthPrime(parseInteger(n)), globalOptions())
  );

program
  .command('is-prime <x>')
  .description('Check whether x is prime')
  .action((x: string) =>
    runCommand('Testing', () => isPrime(parseInteger(x)), globalOptions())
  );

program
  .command('next <primes...>')
  .description('Print the prime following a list of consecutive primes from 2')
  .action((primes: string[]) =>
    runCommand('Searching', () => nextPrime(primes.map(parseInteger)), globalOptions())
  );

program
  .command('composites <x>')
  .description('List all composite numbers up to and including x')
  .action((x: string) =>
    runCommand('Sieving', () => compositesUpTo(parseInteger(x)), globalOptions())
  );

program
  .command('twins <x>')
  .description('List twin prime pairs up to x')
  .action((x: string) =>
    runCommand('Sieving', () => twinPrimesUpTo(parseInteger(x)), globalOptions())
  );

program.parse();
