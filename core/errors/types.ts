import { ErrorSeverity } from '../../types/errors';

/** Structured context attached to an error or a reported issue */
export interface ErrorDetails extends Record<string, unknown> {
  originalError?: string;
}

/**
 * Failure of a comparison run. `code` is the stable identifier printed by the
 * CLI, e.g. `DXF_READ_ERROR` or `INVALID_COMPARE_CONFIG`.
 */
export class DrawingCompareError extends Error {
  constructor(
    message: string,
    public code: string,
    public cause?: Error,
    public details?: ErrorDetails
  ) {
    super(message);
    this.name = 'DrawingCompareError';
  }
}

/**
 * Thrown when a drawing cannot be read or decoded. Carries no partial result.
 */
export class ExtractionError extends DrawingCompareError {
  constructor(
    message: string,
    code: string,
    cause?: Error,
    details?: ErrorDetails
  ) {
    super(message, code, cause, details);
    this.name = 'ExtractionError';
  }
}

/**
 * Thrown for invalid comparison options, before any file is read
 */
export class ConfigurationError extends DrawingCompareError {
  constructor(
    message: string,
    code: string,
    cause?: Error,
    details?: ErrorDetails
  ) {
    super(message, code, cause, details);
    this.name = 'ConfigurationError';
  }
}

export function createErrorDetails(originalError: unknown): ErrorDetails {
  return {
    originalError: originalError instanceof Error ? originalError.message : String(originalError)
  };
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export interface ReportedIssue {
  message: string;
  code: string;
  severity: ErrorSeverity;
  details?: ErrorDetails;
}

/**
 * Collects non-fatal problems, such as skipped entities or failed batch
 * pairs, so a run can finish and list them afterwards
 */
export interface ErrorReporter {
  addError: (message: string, code: string, details?: ErrorDetails) => void;
  addWarning: (message: string, code: string, details?: ErrorDetails) => void;
  clear: () => void;
  getErrors: () => ReportedIssue[];
  getWarnings: () => ReportedIssue[];
}
