/**
 * Handler Registry
 *
 * Maps handler-type names to factories. Populated once at start-up,
 * then optionally sealed; afterwards it is only read, so concurrent
 * `create` calls are safe.
 *
 * @module handlers
 */

import type { WorkflowSpec } from '../types/core-types.js';
import { RegistryError } from '../errors/RegistryError.js';
import { suggestClosest } from '../errors/Suggestions.js';
import type { Handler, HandlerFactory, HandlerOptions } from './Handler.js';

export class HandlerRegistry {
  private readonly factories = new Map<string, HandlerFactory>();
  private sealed = false;

  /**
   * @throws {RegistryError} DuplicateType, or Sealed after `seal()`
   */
  register(typeName: string, factory: HandlerFactory): this {
    if (this.sealed) {
      throw RegistryError.sealed(typeName);
    }
    if (this.factories.has(typeName)) {
      throw RegistryError.duplicateType(typeName);
    }

    this.factories.set(typeName, factory);
    return this;
  }

  registerAll(factories: Readonly<Record<string, HandlerFactory>>): this {
    for (const [typeName, factory] of Object.entries(factories)) {
      this.register(typeName, factory);
    }
    return this;
  }

  has(typeName: string): boolean {
    return this.factories.has(typeName);
  }

  /**
   * Registered type names, in registration order
   */
  getNames(): string[] {
    return Array.from(this.factories.keys());
  }

  get size(): number {
    return this.factories.size;
  }

  /**
   * Create a fresh handler. Factory errors propagate unchanged.
   *
   * @throws {RegistryError} UnknownType, with a "did you mean" hint
   */
  create(typeName: string, options: HandlerOptions): Handler {
    const factory = this.factories.get(typeName);
    if (!factory) {
      throw RegistryError.unknownType(typeName, options.stepId, suggestClosest(typeName, this.factories.keys()));
    }
    return factory(options);
  }

  /**
   * Pre-flight pass: one error per step whose type is not registered,
   * in declaration order
   */
  findUnknownTypes(spec: WorkflowSpec): RegistryError[] {
    return spec.steps
      .filter((step) => !this.factories.has(step.handler))
      .map((step) =>
        RegistryError.unknownType(step.handler, step.id, suggestClosest(step.handler, this.factories.keys())),
      );
  }

  /**
   * @throws {RegistryError} the first unknown type
   */
  assertKnownTypes(spec: WorkflowSpec): void {
    const [first] = this.findUnknownTypes(spec);
    if (first) {
      throw first;
    }
  }

  /**
   * Make the registry read-only
   */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }
}

/**
 * Process-wide registry, for callers that do not need isolation
 */
export const globalHandlerRegistry = new HandlerRegistry();
