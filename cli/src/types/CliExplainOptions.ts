/**
 * CLI Explain Command Options
 *
 * Command-line options for the `leadflow explain` command.
 */

import type { FormatterType } from '../formatters/createFormatter.js';

export interface CliExplainOptions {
  format: FormatterType;

  /**
   * Also list every step with its handler and successors
   */
  verbose?: boolean;

  silent?: boolean;

  /**
   * Set to false by --no-color
   */
  color: boolean;
}
