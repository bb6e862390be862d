/**
 * Log levels, named as pino names them
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  SILENT = 'silent',
}

/**
 * Log categories (phase-based, not feature-based)
 *
 * - 'system': Engine setup, configuration, handler registration
 * - 'analysis': Loading, validation, graph building, explain
 * - 'runtime': Actual workflow execution (steps, completion, failures)
 *
 * Never add handler or business domain categories here.
 */
export type LogCategory = 'system' | 'analysis' | 'runtime';

/**
 * Output format of the engine logger
 */
export type EngineLogFormat = 'text' | 'pretty' | 'json';

/**
 * Structured log entry. Every entry has a category and a source.
 */
export interface EngineLogEntry {
  timestamp: number;
  level: Exclude<LogLevel, LogLevel.SILENT>;
  category: LogCategory;
  /** e.g. 'WorkflowExecutor', 'WorkflowLoader', 'HandlerRegistry' */
  source: string;
  message: string;
  context?: Record<string, unknown>;
  error?: { name: string; message: string; code?: string };
}

/**
 * Destination of formatted log lines
 */
export type LogSink = (line: string, entry: EngineLogEntry) => void;

export interface EngineLoggerConfig {
  level: LogLevel;
  format?: EngineLogFormat;
  colors?: boolean;
  timestamp?: boolean;
  source?: string;
  category?: LogCategory;
  sink?: LogSink;
}
