/**
 * Workflow Loader Module
 *
 * Utility layer for loading workflows from files, strings and objects.
 * I/O-aware but execution-agnostic.
 *
 * @module loader
 */

export * from './WorkflowLoader.js';
export * from './EnvInterpolator.js';
