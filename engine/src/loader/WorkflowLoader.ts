/**
 * Workflow Loader
 *
 * ARCHITECTURAL ROLE:
 * ===================
 * A utility layer, not part of the execution engine.
 *
 * Responsibilities:
 * - File I/O (reading workflow files from disk)
 * - YAML/JSON parsing
 * - Env interpolation of tool configs and the workflow config
 * - Schema validation, through the WorkflowParser
 *
 * Does NOT:
 * - Build or check the step graph (that's the GraphBuilder)
 * - Execute workflows
 *
 * USAGE:
 * ======
 * ```ts
 * // CLI
 * const spec = await WorkflowLoader.fromFile('./workflows/outreach.yaml');
 * await engine.run(spec);
 *
 * // Test
 * const spec = WorkflowLoader.fromObject({ name: 'demo', steps: [...] }, { env: {} });
 * ```
 *
 * @module loader
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import YAML from 'yaml';
import type { WorkflowSpec } from '../types/core-types.js';
import { SchemaError } from '../errors/SchemaError.js';
import { describeThrown, isEngineError } from '../errors/EngineError.js';
import { WorkflowParser } from '../parser/WorkflowParser.js';
import { createSilentLogger, type EngineLogger } from '../logging/EngineLogger.js';
import { EnvInterpolator } from './EnvInterpolator.js';

export interface LoadOptions {
  /** Variables for `{{VAR}}` placeholders (default: process.env) */
  env?: Readonly<Record<string, string | undefined>>;

  /** Fail on a placeholder with no value instead of keeping it */
  strictEnv?: boolean;

  logger?: EngineLogger;
}

export interface LoadFromStringOptions extends LoadOptions {
  /** Label used in error messages */
  source?: string;
}

export class WorkflowLoader {
  /**
   * Load workflow from file path
   *
   * PIPELINE:
   * 1. Validate file exists
   * 2. Read file content
   * 3. Parse content (YAML; JSON is valid YAML)
   * 4. Interpolate and validate
   *
   * @throws {SchemaError} FileNotFound, ParseError, InvalidDocument, UnresolvedVariable
   */
  static async fromFile(filePath: string, options: LoadOptions = {}): Promise<WorkflowSpec> {
    const logger = this.loggerFor(options);
    const resolvedPath = resolve(filePath);

    if (!existsSync(resolvedPath)) {
      const error = SchemaError.fileNotFound(filePath);
      logger.error('Workflow file not found', error, { path: resolvedPath });
      throw error;
    }

    let content: string;
    try {
      content = await readFile(resolvedPath, 'utf-8');
    } catch (error) {
      throw SchemaError.parseError(filePath, describeThrown(error).message);
    }

    logger.debug('Workflow file read', { path: resolvedPath, bytes: content.length });
    return this.fromString(content, { ...options, source: filePath });
  }

  /**
   * Parse YAML or JSON content already in memory
   */
  static fromString(content: string, options: LoadFromStringOptions = {}): WorkflowSpec {
    const source = options.source ?? 'inline workflow';
    const raw = this.parseContent(content, source, this.loggerFor(options));
    return this.fromObject(raw, { ...options, source });
  }

  /**
   * Validate a document that is already a plain object (e.g. an API body)
   */
  static fromObject(raw: unknown, options: LoadFromStringOptions = {}): WorkflowSpec {
    const logger = this.loggerFor(options);
    const source = options.source ?? 'workflow object';

    try {
      const spec = WorkflowParser.parse(raw, {
        source,
        interpolator: new EnvInterpolator({ env: options.env, strict: options.strictEnv, logger }),
      });
      logger.info('Workflow loaded', { workflow: spec.name, version: spec.version, steps: spec.steps.length, source });
      return spec;
    } catch (error) {
      if (isEngineError(error)) {
        logger.error('Workflow document rejected', error, { source });
      }
      throw error;
    }
  }

  /**
   * Phase 1 only: syntax check, no schema validation
   */
  private static parseContent(content: string, source: string, logger: EngineLogger): unknown {
    try {
      return YAML.parse(content);
    } catch (error) {
      const parseError = SchemaError.parseError(source, describeThrown(error).message);
      logger.error('Workflow document could not be parsed', parseError, { source });
      throw parseError;
    }
  }

  private static loggerFor(options: LoadOptions): EngineLogger {
    return (options.logger ?? createSilentLogger()).child({ source: 'WorkflowLoader', category: 'analysis' });
  }
}
