/**
 * CLI Validate Command Options
 *
 * Command-line options for the `leadflow validate` command.
 */

import type { FormatterType } from '../formatters/createFormatter.js';

export interface CliValidateOptions {
  /**
   * Also report handler types this module does not register
   */
  handlers?: string;

  format: FormatterType;

  /**
   * Show error context and the step list
   */
  verbose?: boolean;

  silent?: boolean;

  /**
   * Set to false by --no-color
   */
  color: boolean;
}
