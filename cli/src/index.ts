/**
 * Programmatic access to the leadflow CLI: the command tree and the
 * formatters it prints through.
 */

export { CLI_VERSION, createProgram } from './program.js';
export { exitCodeFor } from './commands/run.js';

export type { Formatter, FormatterOptions } from './formatters/Formatter.js';
export { HumanFormatter } from './formatters/HumanFormatter.js';
export { JsonFormatter } from './formatters/JsonFormatter.js';
export { NullFormatter } from './formatters/NullFormatter.js';
export { createFormatter, isFormatterType, FORMATTER_TYPES } from './formatters/createFormatter.js';
export type { FormatterType } from './formatters/createFormatter.js';

export type { CliRunOptions } from './types/CliRunOptions.js';
export { parseKeyValuePairs } from './types/CliRunOptions.js';
export type { CliValidateOptions } from './types/CliValidateOptions.js';
export type { CliExplainOptions } from './types/CliExplainOptions.js';
export { loadHandlers, isHandlerModule } from './utils/handlers.js';
export type { HandlerModule } from './utils/handlers.js';
