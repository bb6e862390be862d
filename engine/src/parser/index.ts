/**
 * Parser Module
 *
 * Raw document -> WorkflowSpec: schema validation, field aliases and
 * input binding syntax.
 *
 * @module parser
 */

export * from './SchemaValidator.js';
export * from './StepParser.js';
export * from './WorkflowParser.js';
