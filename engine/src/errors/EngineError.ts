/**
 * Base Engine Error
 *
 * Every error the engine raises carries a structured diagnostic so the
 * CLI and programmatic callers can render or serialize it uniformly.
 *
 * @module errors
 */

import {
  ErrorCode,
  ErrorSeverity,
  ExitCode,
  getErrorCategory,
  getErrorDescription,
} from './ErrorCodes.js';

export interface EngineErrorDiagnostic {
  /** Structured error code (e.g., LF-G-004) */
  code: ErrorCode;

  message: string;

  severity: ErrorSeverity;

  /** Process exit code used by the CLI (default: FAILURE) */
  exitCode?: ExitCode;

  /** Location of the problem (e.g., "steps[2].next") */
  path?: string;

  /** Suggestion for fixing the problem */
  hint?: string;

  context?: Record<string, unknown>;
}

/**
 * Base error class for all engine errors
 *
 * @example
 * ```typescript
 * throw new EngineError({
 *   code: ErrorCode.GRAPH_NO_ENTRY,
 *   message: 'Workflow "outreach" has no entry step',
 *   severity: ErrorSeverity.ERROR,
 * });
 * ```
 */
export class EngineError extends Error {
  public readonly diagnostic: Readonly<EngineErrorDiagnostic & { exitCode: ExitCode }>;

  public readonly timestamp: Date;

  constructor(diagnostic: EngineErrorDiagnostic) {
    super(diagnostic.message);
    this.name = new.target.name;
    this.diagnostic = {
      ...diagnostic,
      exitCode: diagnostic.exitCode ?? ExitCode.FAILURE,
    };
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get code(): ErrorCode {
    return this.diagnostic.code;
  }

  get exitCode(): ExitCode {
    return this.diagnostic.exitCode;
  }

  get path(): string | undefined {
    return this.diagnostic.path;
  }

  get hint(): string | undefined {
    return this.diagnostic.hint;
  }

  get severity(): ErrorSeverity {
    return this.diagnostic.severity;
  }

  get context(): Record<string, unknown> {
    return this.diagnostic.context ?? {};
  }

  /**
   * Schema, Graph, Registry, Execution or State
   */
  get category(): string {
    return getErrorCategory(this.code);
  }

  get description(): string {
    return getErrorDescription(this.code);
  }

  get isFatal(): boolean {
    return this.severity === ErrorSeverity.ERROR;
  }

  toString(): string {
    let msg = `${this.name} [${this.code}]`;

    if (this.path) {
      msg += ` at ${this.path}`;
    }

    msg += `: ${this.message}`;

    if (this.hint) {
      msg += `\nHint: ${this.hint}`;
    }

    return msg;
  }

  /**
   * Plain representation for structured logs and `--format json`
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      code: this.code,
      exitCode: this.exitCode,
      message: this.message,
      path: this.path,
      hint: this.hint,
      severity: this.severity,
      context: this.diagnostic.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * Narrow an unknown thrown value to EngineError
 */
export function isEngineError(value: unknown): value is EngineError {
  return value instanceof EngineError;
}

/**
 * Message of any thrown value
 */
export function describeThrown(value: unknown): { name: string; message: string } {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return { name: 'Error', message: String(value) };
}
