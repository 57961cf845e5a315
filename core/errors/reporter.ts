import { ErrorSeverity } from '../../types/errors';
import { ErrorDetails, ErrorReporter, ReportedIssue } from './types';

export class ErrorReporterImpl implements ErrorReporter {
  private errors: ReportedIssue[] = [];
  private warnings: ReportedIssue[] = [];

  addError(message: string, code: string, details?: ErrorDetails): void {
    this.errors.push({ message, code, severity: ErrorSeverity.ERROR, details });
  }

  addWarning(message: string, code: string, details?: ErrorDetails): void {
    this.warnings.push({ message, code, severity: ErrorSeverity.WARNING, details });
  }

  getErrors(): ReportedIssue[] {
    return [...this.errors];
  }

  getWarnings(): ReportedIssue[] {
    return [...this.warnings];
  }

  clear(): void {
    this.errors = [];
    this.warnings = [];
  }
}

/**
 * DXF-specific reporter with helpers for entity-level problems
 */
export class DxfErrorReporter extends ErrorReporterImpl {
  /**
   * Record an entity that was skipped during extraction
   * @param entityType The type of entity (e.g., 'LINE', 'CIRCLE')
   * @param handle The entity handle or identifier
   */
  addEntityWarning(
    entityType: string,
    handle: string | undefined,
    message: string,
    details?: ErrorDetails
  ): void {
    this.addWarning(
      `Entity ${entityType} (Handle: ${handle || 'unknown'}) - ${message}`,
      'DXF_ENTITY_SKIPPED',
      {
        entityType,
        handle,
        ...details
      }
    );
  }
}

export function createErrorReporter(): ErrorReporter {
  return new ErrorReporterImpl();
}

export function createDxfErrorReporter(): DxfErrorReporter {
  return new DxfErrorReporter();
}
