/**
 * Error Infrastructure
 *
 * @module errors
 */

export * from './ErrorCodes.js';
export * from './EngineError.js';
export * from './GraphError.js';
export * from './RegistryError.js';
export * from './StepExecutionError.js';
export * from './StateError.js';
export * from './SchemaError.js';
export * from './ErrorFormatter.js';
export * from './Suggestions.js';
