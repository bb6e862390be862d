/**
 * Workflow Parser
 *
 * Main entry point for turning a raw document into a WorkflowSpec.
 * Orchestrates schema validation, env interpolation and step parsing.
 * Graph structure (unknown successors, cycles, entry) is checked later
 * by the GraphBuilder.
 *
 * @module parser
 */

import type { WorkflowConfig, WorkflowSpec } from '../types/core-types.js';
import type { EnvInterpolator } from '../loader/EnvInterpolator.js';
import { isPlainObject } from '../context/BindingResolver.js';
import { SchemaValidator } from './SchemaValidator.js';
import { StepParser } from './StepParser.js';

export const DEFAULT_WORKFLOW_VERSION = '1.0.0';

export interface ParseOptions {
  /** File path or label used in error messages */
  source?: string;

  /** Applied to tool configs and the workflow config */
  interpolator?: EnvInterpolator;
}

export class WorkflowParser {
  /**
   * Parse workflow from raw object (already parsed YAML/JSON)
   *
   * @throws {SchemaError} InvalidDocument, InvalidStepDefinition or UnresolvedVariable
   */
  static parse(raw: unknown, options: ParseOptions = {}): WorkflowSpec {
    const validated = SchemaValidator.validate(raw, options.source ?? 'workflow object');
    const steps = StepParser.parseAll(validated.steps, options.interpolator);

    const name = validated.name ?? validated.workflow_name ?? '';
    const version = validated.version === undefined ? DEFAULT_WORKFLOW_VERSION : String(validated.version);

    return {
      name,
      version,
      description: validated.description,
      steps,
      config: this.parseConfig(validated.config, options.interpolator),
    };
  }

  private static parseConfig(config: Record<string, unknown>, interpolator: EnvInterpolator | undefined): WorkflowConfig {
    if (!interpolator) {
      return { ...config };
    }
    const interpolated = interpolator.interpolate(config, 'config');
    return isPlainObject(interpolated) ? interpolated : { ...config };
  }
}
