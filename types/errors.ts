/**
 * Severity levels for errors
 */
export enum ErrorSeverity {
  /** Informational message */
  INFO = 'info',
  /** Warning that doesn't prevent operation */
  WARNING = 'warning',
  /** Error that affects operation but allows continuation */
  ERROR = 'error',
  /** Critical error that prevents operation */
  CRITICAL = 'critical'
}
