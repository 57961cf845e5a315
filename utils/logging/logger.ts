/* eslint-disable no-restricted-syntax */
import { LogContext, LogEntry } from '../../core/logging/types';
import { LogManager } from '../../core/logging/log-manager';
import { isLogLevelEnabled } from '../../core/logging/logLevelConfig';

type LogEventListener = (log: LogEntry) => void;

class LogEventEmitter {
  private listeners: LogEventListener[] = [];

  addListener(listener: LogEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  emit(log: LogEntry): void {
    this.listeners.forEach(listener => listener(log));
  }
}

const logEmitter = new LogEventEmitter();

function getSource(context?: LogContext): string {
  return typeof context?.source === 'string' ? context.source : 'unknown';
}

function emit(level: LogEntry['level'], message: string, data?: unknown, context?: LogContext): void {
  const source = getSource(context);
  const manager = LogManager.getInstance();
  manager[level](source, message, data, context);
  if (!isLogLevelEnabled(source, level)) return;
  logEmitter.emit({
    timestamp: new Date().toISOString(),
    level,
    source,
    message,
    data,
    context
  });
}

/**
 * Application-facing logger. Pass `{ source }` in the context to attribute the entry.
 */
export const logger = {
  addLogListener: (listener: LogEventListener) => logEmitter.addListener(listener),

  debug(message: string, data?: unknown, context?: LogContext): void {
    emit('debug', message, data, context);
  },

  info(message: string, data?: unknown, context?: LogContext): void {
    emit('info', message, data, context);
  },

  warn(message: string, data?: unknown, context?: LogContext): void {
    emit('warn', message, data, context);
  },

  error(message: string, data?: unknown, context?: LogContext): void {
    emit('error', message, data, context);
  }
};

export type Logger = typeof logger;

export interface SourceLogger {
  debug(message: string, data?: unknown, context?: LogContext): void;
  info(message: string, data?: unknown, context?: LogContext): void;
  warn(message: string, data?: unknown, context?: LogContext): void;
  error(message: string, data?: unknown, context?: LogContext): void;
}

/**
 * Logger bound to one source name
 */
export function createLogger(source: string): SourceLogger {
  return {
    debug: (message, data, context) => emit('debug', message, data, { ...context, source }),
    info: (message, data, context) => emit('info', message, data, { ...context, source }),
    warn: (message, data, context) => emit('warn', message, data, { ...context, source }),
    error: (message, data, context) => emit('error', message, data, { ...context, source })
  };
}

/* eslint-enable no-restricted-syntax */
