/**
 * Step Parser
 *
 * Converts validated step definitions into StepSpecs: resolves field
 * aliases, interpolates tool configs and turns `{{...}}` input strings
 * into bindings.
 *
 * Input string forms:
 * - `{{step_id.output_key}}`  one key of a step's output
 * - `{{step_id}}`             the whole output of a step
 * - `{{config.a.b}}`          a workflow config path
 * - `{{config.a.b | text}}`   the same, with a fallback string
 * Anything else, including strings that merely contain `{{`, is a literal.
 *
 * @module parser
 */

import type { BindingSource, StepSpec, ToolSpec } from '../types/core-types.js';
import { SchemaError } from '../errors/SchemaError.js';
import type { EnvInterpolator } from '../loader/EnvInterpolator.js';
import { isPlainObject } from '../context/BindingResolver.js';
import type { RawStepDefinition } from './SchemaValidator.js';

const STEP_ID = /^[A-Za-z][A-Za-z0-9_-]*$/;
const REFERENCE = /^\{\{\s*([^{}]+?)\s*\}\}$/;
const CONFIG_REFERENCE = /^config(?:\.|\s*\||$)/;

export class StepParser {
  /**
   * @throws {SchemaError} InvalidStepDefinition for an id that cannot be referenced
   */
  static parse(raw: RawStepDefinition, index: number, interpolator?: EnvInterpolator): StepSpec {
    const stepPath = `steps[${index}]`;

    if (!STEP_ID.test(raw.id)) {
      throw SchemaError.invalidStepDefinition(
        `Invalid step id "${raw.id}": ids start with a letter and contain only letters, digits, "_" and "-"`,
        raw.id,
      );
    }

    const handler = raw.handler ?? raw.agent;
    if (handler === undefined) {
      throw SchemaError.invalidStepDefinition(`Step "${raw.id}" has no handler type`, raw.id);
    }

    const tools: ToolSpec[] = raw.tools.map((tool, toolIndex) => ({
      name: tool.name,
      config: this.interpolateConfig(tool.config, `${stepPath}.tools[${toolIndex}].config`, interpolator),
    }));

    const entries: Array<[string, unknown]> = Array.isArray(raw.inputs)
      ? raw.inputs.map((entry) => [entry.key, entry.value])
      : Object.entries(raw.inputs);

    const spec: StepSpec = {
      id: raw.id,
      handler,
      instructions: raw.instructions,
      inputs: entries.map(([key, value]) => ({ key, source: parseBindingValue(value) })),
      next: [...(raw.next ?? raw.next_steps ?? [])],
      tools,
      outputSchema: { ...(raw.outputSchema ?? raw.output_schema ?? {}) },
      description: raw.description,
    };

    return spec;
  }

  static parseAll(steps: readonly RawStepDefinition[], interpolator?: EnvInterpolator): StepSpec[] {
    return steps.map((step, index) => this.parse(step, index, interpolator));
  }

  private static interpolateConfig(
    config: Record<string, unknown>,
    path: string,
    interpolator: EnvInterpolator | undefined,
  ): Record<string, unknown> {
    if (!interpolator) {
      return { ...config };
    }
    const interpolated = interpolator.interpolate(config, path);
    return isPlainObject(interpolated) ? interpolated : { ...config };
  }
}

/**
 * Binding for one declared input value
 */
export function parseBindingValue(value: unknown): BindingSource {
  if (typeof value !== 'string') {
    return { kind: 'literal', value };
  }

  const match = REFERENCE.exec(value);
  const reference = match?.[1];
  if (reference === undefined) {
    return { kind: 'literal', value };
  }

  if (CONFIG_REFERENCE.test(reference)) {
    const [target, fallback] = splitFallback(reference);
    const path = target === 'config' ? [] : target.slice('config.'.length).split('.');
    return fallback === undefined ? { kind: 'config', path } : { kind: 'config', path, fallback };
  }

  if (reference.includes('|')) {
    return { kind: 'literal', value };
  }

  const dot = reference.indexOf('.');
  if (dot === -1) {
    return { kind: 'step', stepId: reference };
  }
  return { kind: 'step', stepId: reference.slice(0, dot), outputKey: reference.slice(dot + 1) };
}

/**
 * `outreach.tone | friendly` -> ['outreach.tone', 'friendly']
 */
function splitFallback(reference: string): [string, string | undefined] {
  const bar = reference.indexOf('|');
  if (bar === -1) {
    return [reference.trim(), undefined];
  }
  return [reference.slice(0, bar).trim(), reference.slice(bar + 1).trim()];
}
