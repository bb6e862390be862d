/**
 * Engine Configuration
 *
 * User-facing configuration for WorkflowEngine.
 * Every option is optional; `applyConfigDefaults` fills in the rest.
 *
 * @example
 * ```ts
 * const engine = new WorkflowEngine({
 *   logLevel: 'warn',
 *   maxConcurrentSteps: 4,
 *   stepTimeoutMs: 30_000,
 *   handlers: { prospect_search: createProspectSearch },
 * });
 * ```
 *
 * @module core
 */

import { z } from 'zod';
import type { EngineLogFormat, LogSink } from '../types/log-types.js';
import type { HandlerFactory } from '../handlers/Handler.js';
import { HandlerRegistry } from '../handlers/HandlerRegistry.js';
import { SchemaError } from '../errors/SchemaError.js';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface WorkflowEngineConfig {
  // === Logging ===

  /**
   * @default 'info'
   */
  logLevel?: LogLevelName;

  /**
   * @default 'text'
   */
  logFormat?: EngineLogFormat;

  /**
   * Colourise text and pretty output
   * @default true
   */
  colors?: boolean;

  /**
   * Replaces the default stderr writer
   */
  logSink?: LogSink;

  // === Execution ===

  /**
   * Steps running at once within one run. 1 means strictly sequential.
   * @default 1
   */
  maxConcurrentSteps?: number;

  /**
   * Fail a step whose handler has not settled after this many milliseconds.
   * No timeout when unset.
   */
  stepTimeoutMs?: number;

  // === Handlers ===

  /**
   * Handler factories registered when the engine is created
   */
  handlers?: Record<string, HandlerFactory>;

  /**
   * Registry to use instead of a private one, e.g. `globalHandlerRegistry`
   */
  registry?: HandlerRegistry;
}

const handlerFactorySchema = z.custom<HandlerFactory>((value) => typeof value === 'function', {
  message: 'Expected a handler factory function',
});

const engineConfigSchema = z
  .object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    logFormat: z.enum(['text', 'pretty', 'json']).optional(),
    colors: z.boolean().optional(),
    logSink: z
      .custom<LogSink>((value) => typeof value === 'function', { message: 'Expected a function' })
      .optional(),
    maxConcurrentSteps: z.number().int().min(1).optional(),
    stepTimeoutMs: z.number().positive().optional(),
    handlers: z.record(handlerFactorySchema).optional(),
    registry: z
      .custom<HandlerRegistry>((value) => value instanceof HandlerRegistry, {
        message: 'Expected a HandlerRegistry instance',
      })
      .optional(),
  })
  .strict();

export type ResolvedEngineConfig = Required<
  Omit<WorkflowEngineConfig, 'logSink' | 'stepTimeoutMs' | 'handlers' | 'registry'>
> &
  Pick<WorkflowEngineConfig, 'logSink' | 'stepTimeoutMs' | 'handlers' | 'registry'>;

/**
 * Check the configuration shape
 *
 * @throws {SchemaError} InvalidEngineConfig listing every problem
 */
export function validateConfig(config: unknown): WorkflowEngineConfig {
  const parsed = engineConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw SchemaError.invalidEngineConfig(
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }
  return parsed.data;
}

export function applyConfigDefaults(config: WorkflowEngineConfig = {}): ResolvedEngineConfig {
  return {
    logLevel: config.logLevel ?? 'info',
    logFormat: config.logFormat ?? 'text',
    colors: config.colors ?? true,
    logSink: config.logSink,
    maxConcurrentSteps: config.maxConcurrentSteps ?? 1,
    stepTimeoutMs: config.stepTimeoutMs,
    handlers: config.handlers,
    registry: config.registry,
  };
}
