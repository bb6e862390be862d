/**
 * Schema Errors
 *
 * Problems with workflow documents and engine configuration, raised by
 * the loader, the parser, the step builders and the engine constructor.
 *
 * USAGE:
 * =====
 * ```typescript
 * throw SchemaError.fileNotFound('./workflows/outreach.yaml');
 * ```
 *
 * @module errors
 */

import { EngineError } from './EngineError.js';
import { ErrorCode, ErrorSeverity } from './ErrorCodes.js';

/**
 * One issue reported by document validation
 */
export interface SchemaIssue {
  path: string;
  message: string;
}

export class SchemaError extends EngineError {
  static parseError(source: string, detail: string): SchemaError {
    return new SchemaError({
      code: ErrorCode.SCHEMA_PARSE_ERROR,
      message: `Could not parse workflow from ${source}: ${detail}`,
      hint: 'Check the document for YAML or JSON syntax errors.',
      severity: ErrorSeverity.ERROR,
      context: { source, detail },
    });
  }

  static invalidDocument(source: string, issues: readonly SchemaIssue[]): SchemaError {
    const first = issues[0];
    const summary = first ? `${first.path || '(root)'}: ${first.message}` : 'unknown problem';
    const more = issues.length > 1 ? ` (and ${issues.length - 1} more)` : '';
    return new SchemaError({
      code: ErrorCode.SCHEMA_INVALID_DOCUMENT,
      message: `Invalid workflow document ${source}: ${summary}${more}`,
      path: first?.path,
      severity: ErrorSeverity.ERROR,
      context: { source, issues: issues.map((issue) => ({ ...issue })) },
    });
  }

  static fileNotFound(filePath: string): SchemaError {
    return new SchemaError({
      code: ErrorCode.SCHEMA_FILE_NOT_FOUND,
      message: `Workflow file not found: ${filePath}`,
      hint: 'Check the path, relative to the current directory.',
      severity: ErrorSeverity.ERROR,
      context: { filePath },
    });
  }

  static unresolvedVariable(variable: string, path: string): SchemaError {
    return new SchemaError({
      code: ErrorCode.SCHEMA_UNRESOLVED_VARIABLE,
      message: `Environment variable "${variable}" is not set`,
      path,
      hint: `Export ${variable} or disable strictEnv.`,
      severity: ErrorSeverity.ERROR,
      context: { variable },
    });
  }

  static invalidEngineConfig(issues: readonly SchemaIssue[]): SchemaError {
    const detail = issues.map((issue) => `${issue.path || '(root)'}: ${issue.message}`).join('; ');
    return new SchemaError({
      code: ErrorCode.SCHEMA_INVALID_ENGINE_CONFIG,
      message: `Invalid engine configuration: ${detail}`,
      severity: ErrorSeverity.ERROR,
      context: { issues: issues.map((issue) => ({ ...issue })) },
    });
  }

  static invalidStepDefinition(detail: string, stepId?: string): SchemaError {
    return new SchemaError({
      code: ErrorCode.SCHEMA_INVALID_STEP_DEFINITION,
      message: detail,
      path: stepId ? `steps.${stepId}` : 'steps',
      severity: ErrorSeverity.ERROR,
      context: { stepId },
    });
  }
}
