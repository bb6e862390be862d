/**
 * Handler Registry Errors
 *
 * @module errors
 */

import { EngineError, type EngineErrorDiagnostic } from './EngineError.js';
import { ErrorCode, ErrorSeverity } from './ErrorCodes.js';

export type RegistryErrorKind = 'UnknownType' | 'DuplicateType' | 'Sealed';

export class RegistryError extends EngineError {
  constructor(
    public readonly kind: RegistryErrorKind,
    diagnostic: EngineErrorDiagnostic,
  ) {
    super(diagnostic);
  }

  /**
   * @param stepId - the step declaring the type, when known
   */
  static unknownType(typeName: string, stepId?: string, suggestion?: string): RegistryError {
    const where = stepId ? ` (step "${stepId}")` : '';
    return new RegistryError('UnknownType', {
      code: ErrorCode.REGISTRY_UNKNOWN_TYPE,
      message: `Unknown handler type "${typeName}"${where}`,
      path: stepId ? `steps.${stepId}.handler` : undefined,
      hint: suggestion
        ? `Did you mean "${suggestion}"?`
        : 'Register a factory for this type before running the workflow.',
      severity: ErrorSeverity.ERROR,
      context: { typeName, stepId, suggestion },
    });
  }

  static duplicateType(typeName: string): RegistryError {
    return new RegistryError('DuplicateType', {
      code: ErrorCode.REGISTRY_DUPLICATE_TYPE,
      message: `Handler type "${typeName}" is already registered`,
      hint: 'Use a different type name or register each factory once.',
      severity: ErrorSeverity.ERROR,
      context: { typeName },
    });
  }

  static sealed(typeName: string): RegistryError {
    return new RegistryError('Sealed', {
      code: ErrorCode.REGISTRY_SEALED,
      message: `Cannot register "${typeName}": the handler registry is sealed`,
      hint: 'Register every handler type during start-up, before seal() is called.',
      severity: ErrorSeverity.ERROR,
      context: { typeName },
    });
  }
}
