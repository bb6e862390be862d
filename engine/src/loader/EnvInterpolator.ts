/**
 * Env Interpolator
 *
 * Replaces `{{VAR}}` placeholders with environment values inside tool
 * configurations and the workflow config. Input bindings are never
 * interpolated: there `{{...}}` names a step output or config path.
 *
 * @module loader
 */

import { SchemaError } from '../errors/SchemaError.js';
import { isPlainObject } from '../context/BindingResolver.js';
import { createSilentLogger, type EngineLogger } from '../logging/EngineLogger.js';

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

export interface EnvInterpolatorOptions {
  env?: Readonly<Record<string, string | undefined>>;

  /** Throw on a missing variable instead of keeping the placeholder */
  strict?: boolean;

  logger?: EngineLogger;
}

export class EnvInterpolator {
  private readonly env: Readonly<Record<string, string | undefined>>;
  private readonly strict: boolean;
  private readonly logger: EngineLogger;
  private readonly missing = new Set<string>();

  constructor(options: EnvInterpolatorOptions = {}) {
    this.env = options.env ?? process.env;
    this.strict = options.strict ?? false;
    this.logger = (options.logger ?? createSilentLogger()).child({
      source: 'EnvInterpolator',
      category: 'analysis',
    });
  }

  /**
   * Interpolate every string nested in `value`; other values are copied
   *
   * @param path - Location used in warnings and errors, e.g. `steps[0].tools[1].config`
   * @throws {SchemaError} UnresolvedVariable in strict mode
   */
  interpolate(value: unknown, path: string): unknown {
    if (typeof value === 'string') {
      return this.interpolateString(value, path);
    }
    if (Array.isArray(value)) {
      return value.map((item, index) => this.interpolate(item, `${path}[${index}]`));
    }
    if (isPlainObject(value)) {
      const result: Record<string, unknown> = {};
      for (const [key, nested] of Object.entries(value)) {
        result[key] = this.interpolate(nested, `${path}.${key}`);
      }
      return result;
    }
    return value;
  }

  /**
   * Variables that were referenced but not set, in first-seen order
   */
  get unresolved(): readonly string[] {
    return Array.from(this.missing);
  }

  private interpolateString(text: string, path: string): string {
    return text.replace(PLACEHOLDER, (placeholder: string, name: string) => {
      const resolved = this.env[name];
      if (resolved !== undefined) {
        return resolved;
      }

      if (this.strict) {
        throw SchemaError.unresolvedVariable(name, path);
      }
      if (!this.missing.has(name)) {
        this.missing.add(name);
        this.logger.warn('Environment variable not set; placeholder kept', { variable: name, path });
      }
      return placeholder;
    });
  }
}
