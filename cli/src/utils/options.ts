/**
 * Option parsing shared by the commands
 *
 * @module utils
 */

import { InvalidArgumentError, Option } from 'commander';
import { FORMATTER_TYPES, type FormatterType } from '../formatters/createFormatter.js';

/**
 * Commander argument parser for options such as --concurrency
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Repeatable option: --env A=1 --env B=2
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function formatOption(formats: readonly FormatterType[] = FORMATTER_TYPES): Option {
  return new Option('-f, --format <format>', 'Output format').choices(formats).default('human');
}
