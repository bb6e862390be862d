/**
 * Engine Logger
 *
 * Structured, level-filtered logging for the engine on top of pino. Every
 * entry carries a category and a source; `child()` derives loggers bound
 * to a narrower source or context (one per step, one per component).
 *
 * pino does the level filtering and serialization. Its JSON lines land in
 * an in-process destination that renders them in the configured format:
 * - text:   `INFO  [runtime:WorkflowExecutor] Step completed stepId=a`
 * - pretty: the same line coloured with chalk
 * - json:   pino's line as written
 *
 * Rendered lines go to the configured sink, stderr by default.
 *
 * @module logging
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { destination, pino, stdTimeFunctions, type DestinationStream, type Logger } from 'pino';
import {
  LogLevel,
  type EngineLogEntry,
  type EngineLogFormat,
  type EngineLoggerConfig,
  type LogCategory,
  type LogSink,
} from '../types/log-types.js';
import { isEngineError } from '../errors/EngineError.js';

type ResolvedLoggerConfig = Required<Omit<EngineLoggerConfig, 'sink'>> & { sink: LogSink };

type EntryLevel = EngineLogEntry['level'];

export interface ChildLoggerOptions {
  source?: string;
  category?: LogCategory;
  context?: Record<string, unknown>;
}

let stderr: DestinationStream | undefined;

const stderrSink: LogSink = (line) => {
  stderr ??= destination({ fd: 2, sync: true });
  stderr.write(`${line}\n`);
};

export class EngineLogger {
  private readonly config: ResolvedLoggerConfig;
  private readonly instance: Logger;

  /**
   * @param instance pino logger to write through; children pass their parent's
   */
  constructor(config: EngineLoggerConfig, instance?: Logger) {
    this.config = {
      level: config.level,
      format: config.format ?? 'text',
      colors: config.colors ?? true,
      timestamp: config.timestamp ?? true,
      source: config.source ?? 'Engine',
      category: config.category ?? 'system',
      sink: config.sink ?? stderrSink,
    };

    this.instance =
      instance ??
      pino(
        {
          level: this.config.level,
          base: undefined,
          timestamp: this.config.timestamp ? stdTimeFunctions.isoTime : false,
          formatters: {
            level: (label) => ({ level: label }),
          },
        },
        createRenderer(this.config),
      );
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  /**
   * Logger sharing this one's level, format and sink
   */
  child(options: ChildLoggerOptions): EngineLogger {
    return new EngineLogger(
      {
        ...this.config,
        source: options.source ?? this.config.source,
        category: options.category ?? this.config.category,
      },
      this.instance.child(options.context ?? {}),
    );
  }

  willLog(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && this.instance.isLevelEnabled(level);
  }

  getConfig(): Readonly<ResolvedLoggerConfig> {
    return { ...this.config };
  }

  private log(level: EntryLevel, message: string, context?: Record<string, unknown>, error?: unknown): void {
    // Origin goes with each call, so nested children never repeat it in a line
    const fields: Record<string, unknown> = {
      category: this.config.category,
      source: this.config.source,
      ...context,
    };
    if (error !== undefined) {
      fields.error = toErrorInfo(error);
    }

    switch (level) {
      case LogLevel.DEBUG:
        this.instance.debug(fields, message);
        break;
      case LogLevel.INFO:
        this.instance.info(fields, message);
        break;
      case LogLevel.WARN:
        this.instance.warn(fields, message);
        break;
      case LogLevel.ERROR:
        this.instance.error(fields, message);
        break;
    }
  }
}

/**
 * pino destination that turns each JSON line into an entry for the sink
 */
function createRenderer(config: ResolvedLoggerConfig): DestinationStream {
  const chalk = new Chalk({ level: config.colors ? 1 : 0 });

  return {
    write(chunk: string): void {
      const line = chunk.trimEnd();
      const entry = toEntry(JSON.parse(line), config);
      const rendered = config.format === 'json' ? line : render(entry, config.format, config.timestamp, chalk);
      config.sink(rendered, entry);
    },
  };
}

function toEntry(record: unknown, config: ResolvedLoggerConfig): EngineLogEntry {
  if (!isRecord(record)) {
    return { timestamp: Date.now(), level: LogLevel.INFO, category: config.category, source: config.source, message: String(record) };
  }

  const { level, time, category, source, msg, error, ...rest } = record;
  const parsedTime = typeof time === 'string' ? Date.parse(time) : Number.NaN;

  return {
    timestamp: Number.isNaN(parsedTime) ? Date.now() : parsedTime,
    level: toLevel(level),
    category: isCategory(category) ? category : config.category,
    source: typeof source === 'string' ? source : config.source,
    message: typeof msg === 'string' ? msg : '',
    context: Object.keys(rest).length > 0 ? rest : undefined,
    error: toEntryError(error),
  };
}

function render(entry: EngineLogEntry, format: Exclude<EngineLogFormat, 'json'>, timestamp: boolean, c: ChalkInstance): string {
  const pretty = format === 'pretty';
  const parts: string[] = [];

  if (timestamp) {
    const stamp = new Date(entry.timestamp).toISOString();
    parts.push(pretty ? c.gray(stamp) : stamp);
  }

  const label = entry.level.toUpperCase().padEnd(5);
  parts.push(pretty ? levelColor(entry.level, c)(label) : label);

  const origin = `[${entry.category}:${entry.source}]`;
  parts.push(pretty ? c.dim(origin) : origin);
  parts.push(entry.message);

  if (entry.context) {
    const fields = Object.entries(entry.context)
      .map(([key, value]) => `${key}=${formatValue(value)}`)
      .join(' ');
    if (fields) parts.push(pretty ? c.cyan(fields) : fields);
  }

  if (entry.error) {
    const code = entry.error.code ? ` [${entry.error.code}]` : '';
    const text = `${entry.error.name}${code}: ${entry.error.message}`;
    parts.push(pretty ? c.red(text) : text);
  }

  return parts.join(' ');
}

function levelColor(level: EntryLevel, c: ChalkInstance): ChalkInstance {
  switch (level) {
    case LogLevel.DEBUG:
      return c.gray;
    case LogLevel.INFO:
      return c.blue;
    case LogLevel.WARN:
      return c.yellow;
    case LogLevel.ERROR:
      return c.red;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCategory(value: unknown): value is LogCategory {
  return value === 'system' || value === 'analysis' || value === 'runtime';
}

function toLevel(value: unknown): EntryLevel {
  switch (value) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

function toEntryError(value: unknown): EngineLogEntry['error'] {
  if (!isRecord(value) || typeof value.name !== 'string' || typeof value.message !== 'string') {
    return undefined;
  }
  return typeof value.code === 'string'
    ? { name: value.name, message: value.message, code: value.code }
    : { name: value.name, message: value.message };
}

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function toErrorInfo(error: unknown): NonNullable<EngineLogEntry['error']> {
  if (isEngineError(error)) {
    return { name: error.name, message: error.message, code: error.code };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: String(error) };
}

/**
 * Logger that drops every entry
 */
export function createSilentLogger(): EngineLogger {
  return new EngineLogger({ level: LogLevel.SILENT });
}

/**
 * Map the engine's `logLevel` option onto a logger
 */
export function createEngineLogger(options: {
  level: `${LogLevel}`;
  format?: EngineLoggerConfig['format'];
  colors?: boolean;
  sink?: LogSink;
}): EngineLogger {
  const levels: Record<`${LogLevel}`, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    silent: LogLevel.SILENT,
  };

  return new EngineLogger({
    level: levels[options.level],
    format: options.format ?? 'text',
    colors: options.colors ?? true,
    timestamp: options.format !== 'text',
    source: 'WorkflowEngine',
    category: 'system',
    sink: options.sink,
  });
}
