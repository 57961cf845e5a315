export type LogContext = {
  source?: string;
  runId?: string;
  [key: string]: unknown;
};

export type LogEntryLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogEntryLevel;
  source: string;
  message: string;
  data?: unknown;
  context?: LogContext;
}

export interface ILogAdapter {
  log(entry: LogEntry): void;
}

export type LoggingConfig = {
  adapters?: string[]; // e.g., ['console']
};
