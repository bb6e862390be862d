/**
 * Leadflow Error Codes
 *
 * Structured diagnostic codes for the workflow engine, separate from the
 * process exit codes the CLI returns.
 *
 * Format: LF-[Category]-[Number]
 *
 * Categories:
 * - S: Schema errors (document parsing, loader, engine config)
 * - G: Graph errors (structure of the step graph)
 * - H: Handler registry errors
 * - E: Step execution errors (contained in step results)
 * - T: Execution state errors
 *
 * ADDING NEW ERRORS:
 * =================
 * 1. Add the code below
 * 2. Add a description in ERROR_DESCRIPTIONS
 * 3. Add a factory method on the matching error class
 *
 * @module errors
 */

export enum ErrorCode {
  // Schema (S)
  SCHEMA_PARSE_ERROR = 'LF-S-001',
  SCHEMA_INVALID_DOCUMENT = 'LF-S-002',
  SCHEMA_FILE_NOT_FOUND = 'LF-S-003',
  SCHEMA_UNRESOLVED_VARIABLE = 'LF-S-004',
  SCHEMA_INVALID_ENGINE_CONFIG = 'LF-S-005',
  SCHEMA_INVALID_STEP_DEFINITION = 'LF-S-006',

  // Graph (G)
  GRAPH_EMPTY_WORKFLOW = 'LF-G-001',
  GRAPH_DUPLICATE_STEP = 'LF-G-002',
  GRAPH_UNKNOWN_STEP = 'LF-G-003',
  GRAPH_CYCLE_DETECTED = 'LF-G-004',
  GRAPH_NO_ENTRY = 'LF-G-005',
  GRAPH_AMBIGUOUS_ENTRY = 'LF-G-006',
  GRAPH_UNREACHABLE_STEP = 'LF-G-007',
  GRAPH_BINDING_NOT_UPSTREAM = 'LF-G-008',

  // Registry (H)
  REGISTRY_UNKNOWN_TYPE = 'LF-H-001',
  REGISTRY_DUPLICATE_TYPE = 'LF-H-002',
  REGISTRY_SEALED = 'LF-H-003',

  // Execution (E)
  EXECUTION_HANDLER_FAILED = 'LF-E-001',
  EXECUTION_INVALID_OUTPUT = 'LF-E-002',
  EXECUTION_MISSING_OUTPUT_KEYS = 'LF-E-003',
  EXECUTION_TIMEOUT = 'LF-E-004',
  EXECUTION_HANDLER_INIT_FAILED = 'LF-E-005',

  // State (T)
  STATE_DUPLICATE_RESULT = 'LF-T-001',
  STATE_UNKNOWN_STEP = 'LF-T-002',
  STATE_ALREADY_COMPLETED = 'LF-T-003',
  STATE_WORKFLOW_MISMATCH = 'LF-T-004',
}

export enum ErrorSeverity {
  ERROR = 'error',
  WARNING = 'warning',
  INFO = 'info',
}

/**
 * Process exit codes returned by the CLI
 */
export enum ExitCode {
  SUCCESS = 0,
  FAILURE = 1,
  PARTIAL = 2,
}

const ERROR_DESCRIPTIONS: Readonly<Record<ErrorCode, string>> = {
  [ErrorCode.SCHEMA_PARSE_ERROR]: 'The workflow document is not valid YAML or JSON.',
  [ErrorCode.SCHEMA_INVALID_DOCUMENT]: 'The workflow document does not match the workflow schema.',
  [ErrorCode.SCHEMA_FILE_NOT_FOUND]: 'The workflow file could not be read.',
  [ErrorCode.SCHEMA_UNRESOLVED_VARIABLE]: 'A {{VAR}} placeholder has no value in the environment.',
  [ErrorCode.SCHEMA_INVALID_ENGINE_CONFIG]: 'The engine configuration is invalid.',
  [ErrorCode.SCHEMA_INVALID_STEP_DEFINITION]: 'A step definition is missing its id or handler type.',

  [ErrorCode.GRAPH_EMPTY_WORKFLOW]: 'The workflow declares no steps.',
  [ErrorCode.GRAPH_DUPLICATE_STEP]: 'Two steps share the same id.',
  [ErrorCode.GRAPH_UNKNOWN_STEP]: 'A successor or binding references a step that does not exist.',
  [ErrorCode.GRAPH_CYCLE_DETECTED]: 'The successor relation contains a cycle.',
  [ErrorCode.GRAPH_NO_ENTRY]: 'Every step has a predecessor, so there is no entry step.',
  [ErrorCode.GRAPH_AMBIGUOUS_ENTRY]: 'More than one step has no predecessor.',
  [ErrorCode.GRAPH_UNREACHABLE_STEP]: 'A step cannot be reached from the entry step.',
  [ErrorCode.GRAPH_BINDING_NOT_UPSTREAM]: 'A binding references a step that is not an ancestor.',

  [ErrorCode.REGISTRY_UNKNOWN_TYPE]: 'No handler factory is registered under this type name.',
  [ErrorCode.REGISTRY_DUPLICATE_TYPE]: 'A handler factory is already registered under this type name.',
  [ErrorCode.REGISTRY_SEALED]: 'The handler registry is sealed and accepts no new types.',

  [ErrorCode.EXECUTION_HANDLER_FAILED]: 'The handler raised an error.',
  [ErrorCode.EXECUTION_INVALID_OUTPUT]: 'The handler returned something other than an output mapping.',
  [ErrorCode.EXECUTION_MISSING_OUTPUT_KEYS]: 'The handler output lacks keys required by the output schema.',
  [ErrorCode.EXECUTION_TIMEOUT]: 'The handler did not finish within the step timeout.',
  [ErrorCode.EXECUTION_HANDLER_INIT_FAILED]: 'The handler factory raised an error.',

  [ErrorCode.STATE_DUPLICATE_RESULT]: 'A result was already recorded for this step.',
  [ErrorCode.STATE_UNKNOWN_STEP]: 'The step is not part of the workflow being executed.',
  [ErrorCode.STATE_ALREADY_COMPLETED]: 'The run this state belongs to has already completed.',
  [ErrorCode.STATE_WORKFLOW_MISMATCH]: 'The state was created for a different workflow than the one being executed.',
};

const CATEGORY_NAMES: Readonly<Record<string, string>> = {
  S: 'Schema',
  G: 'Graph',
  H: 'Registry',
  E: 'Execution',
  T: 'State',
};

/**
 * Category name derived from the code's middle segment
 */
export function getErrorCategory(code: ErrorCode): string {
  const segment = code.split('-')[1] ?? '';
  return CATEGORY_NAMES[segment] ?? 'Unknown';
}

export function getErrorDescription(code: ErrorCode): string {
  return ERROR_DESCRIPTIONS[code];
}
