/**
 * CLI Run Command Options
 *
 * Command-line options for the `leadflow run` command.
 */

import type { FormatterType } from '../formatters/createFormatter.js';

export interface CliRunOptions {
  /**
   * Module exporting `registerHandlers(registry)`
   */
  handlers: string;

  /**
   * Steps running at once (default: 1)
   */
  concurrency?: number;

  /**
   * Per-step timeout in milliseconds
   */
  timeout?: number;

  /**
   * Extra `{{VAR}}` values (key=value), layered over process.env
   */
  env?: string[];

  /**
   * Fail when a `{{VAR}}` placeholder has no value
   */
  strictEnv?: boolean;

  format: FormatterType;

  verbose?: boolean;

  silent?: boolean;

  /**
   * Set to false by --no-color
   */
  color: boolean;
}

/**
 * Parse key=value pairs into object
 *
 * @throws Error on a pair without "=" or with an empty key
 */
export function parseKeyValuePairs(pairs: readonly string[]): Record<string, string> {
  const result: Record<string, string> = {};

  for (const pair of pairs) {
    const index = pair.indexOf('=');
    if (index === -1) {
      throw new Error(`Invalid key=value format: ${pair}`);
    }

    const key = pair.slice(0, index).trim();
    const value = pair.slice(index + 1).trim();

    if (!key) {
      throw new Error(`Empty key in: ${pair}`);
    }

    result[key] = value;
  }

  return result;
}
