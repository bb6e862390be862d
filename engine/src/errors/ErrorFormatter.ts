/**
 * Error Formatter
 *
 * Renders engine errors for terminals. Colours come from chalk and can
 * be switched off for piped output or tests.
 *
 * ```typescript
 * const report = engine.validate(spec);
 * console.error(formatErrors([...report.errors, ...report.warnings]));
 * ```
 *
 * @module errors
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { EngineError } from './EngineError.js';
import { ErrorSeverity } from './ErrorCodes.js';

export interface FormatErrorOptions {
  /** Default: true */
  colors?: boolean;
  /** Adds category, exit code and context */
  verbose?: boolean;
}

function palette(colors: boolean | undefined): ChalkInstance {
  return colors === false ? new Chalk({ level: 0 }) : new Chalk();
}

function severityIcon(severity: ErrorSeverity): string {
  switch (severity) {
    case ErrorSeverity.ERROR:
      return '✗';
    case ErrorSeverity.WARNING:
      return '⚠';
    case ErrorSeverity.INFO:
      return 'ℹ';
  }
}

function severityColor(severity: ErrorSeverity, c: ChalkInstance): ChalkInstance {
  switch (severity) {
    case ErrorSeverity.ERROR:
      return c.red;
    case ErrorSeverity.WARNING:
      return c.yellow;
    case ErrorSeverity.INFO:
      return c.blue;
  }
}

/**
 * Format one error as a short block:
 *
 * ```
 * ✗ GraphError [LF-G-004]
 * at steps
 * Cycle detected: a -> b -> a
 * → Hint: Remove one of the "next" edges along the cycle.
 * ```
 */
export function formatError(error: EngineError, options: FormatErrorOptions = {}): string {
  const c = palette(options.colors);
  const color = severityColor(error.severity, c);
  const lines: string[] = [];

  lines.push(`${color(`${severityIcon(error.severity)} ${error.name}`)} ${c.gray(`[${error.code}]`)}`);

  if (error.path) {
    lines.push(c.dim(`at ${error.path}`));
  }

  lines.push(c.bold(error.message));

  if (error.hint) {
    lines.push(`${c.blue('→ Hint:')} ${error.hint}`);
  }

  if (options.verbose) {
    lines.push(`${c.dim('Category:')} ${error.category}`);
    lines.push(`${c.dim('Exit code:')} ${error.exitCode}`);
    const context = error.diagnostic.context;
    if (context && Object.keys(context).length > 0) {
      lines.push(c.dim('Context:'));
      lines.push(c.gray(JSON.stringify(context, null, 2)));
    }
  }

  return lines.join('\n');
}

/**
 * Format a list of diagnostics, errors first
 */
export function formatErrors(errors: readonly EngineError[], options: FormatErrorOptions = {}): string {
  const c = palette(options.colors);
  const errorCount = errors.filter((error) => error.severity === ErrorSeverity.ERROR).length;
  const warningCount = errors.length - errorCount;

  const ordered = [...errors].sort(
    (a, b) => Number(b.severity === ErrorSeverity.ERROR) - Number(a.severity === ErrorSeverity.ERROR),
  );

  const header = c.bold(`Found ${errorCount} error(s), ${warningCount} warning(s):`);
  const blocks = ordered.map((error) => formatError(error, options));

  return [header, '', blocks.join('\n\n')].join('\n');
}

/**
 * One-line form, for log lines and compact listings
 */
export function formatErrorSummary(error: EngineError, options: FormatErrorOptions = {}): string {
  const c = palette(options.colors);
  const color = severityColor(error.severity, c);
  const path = error.path ? ` at ${error.path}` : '';
  return `${color(`${severityIcon(error.severity)} ${error.code}`)}${path}: ${error.message}`;
}
