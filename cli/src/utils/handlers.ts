/**
 * Loads the caller's handler module
 *
 * The module is imported by path and must export
 * `registerHandlers(registry)`, sync or async:
 *
 * ```ts
 * export function registerHandlers(registry: HandlerRegistry): void {
 *   registry.register('ProspectSearchAgent', BaseHandler.factoryFor(ProspectSearch));
 * }
 * ```
 *
 * @module utils
 */

import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { HandlerRegistry } from '@leadflow/engine';

export interface HandlerModule {
  registerHandlers(registry: HandlerRegistry): void | Promise<void>;
}

export function isHandlerModule(value: unknown): value is HandlerModule {
  return (
    typeof value === 'object' &&
    value !== null &&
    'registerHandlers' in value &&
    typeof value.registerHandlers === 'function'
  );
}

/**
 * @throws Error when the module cannot be imported or lacks `registerHandlers`
 */
export async function loadHandlers(modulePath: string, registry: HandlerRegistry): Promise<string[]> {
  const url = pathToFileURL(resolve(modulePath)).href;
  const loaded: unknown = await import(url);

  if (!isHandlerModule(loaded)) {
    throw new Error(`Handler module ${modulePath} does not export a registerHandlers(registry) function`);
  }

  const before = new Set(registry.getNames());
  await loaded.registerHandlers(registry);
  return registry.getNames().filter((name) => !before.has(name));
}
