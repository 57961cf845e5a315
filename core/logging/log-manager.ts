/* eslint-disable no-restricted-syntax */
// NOTE: LogManager is the sink behind utils/logging/logger. Modules either hold the
// singleton with a LOG_SOURCE or use the `logger` facade.
import { writeFileSync } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import { ILogAdapter, LogContext, LogEntry, LogEntryLevel, LoggingConfig } from './types';
import { getLogLevel, isLogLevelEnabled, LogLevel, setLogLevel } from './logLevelConfig';

/**
 * Every level goes to stderr; stdout carries the comparison report
 */
export const consoleAdapter: ILogAdapter = {
  log(entry: LogEntry): void {
    const line = `[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.source}] ${entry.message}`;
    const payload = entry.data === undefined ? '' : LogManager.getInstance().safeStringify(entry.data, 0);
    if (entry.level === 'warn') {
      console.warn(line, payload);
    } else {
      console.error(line, payload);
    }
  }
};

const adapterRegistry: Record<string, ILogAdapter> = {
  console: consoleAdapter
};

function loadLoggingConfig(): LoggingConfig {
  const raw = process.env.DRAWING_COMPARE_LOG_ADAPTERS;
  if (!raw) {
    return { adapters: ['console'] };
  }
  return { adapters: raw.split(',').map(a => a.trim()).filter(Boolean) };
}

/**
 * Singleton logger for the drawing comparison system
 */
export class LogManager {
  private static instance: LogManager | undefined;
  private logs: LogEntry[] = [];
  private readonly MAX_LOGS = 10000; // Prevent memory issues
  private readonly config: LoggingConfig = loadLoggingConfig();
  private adapters: ILogAdapter[];
  private readonly instanceId: string;

  private constructor() {
    this.instanceId = uuidv4();
    const configured = (this.config.adapters ?? [])
      .map(name => adapterRegistry[name])
      .filter((adapter): adapter is ILogAdapter => adapter !== undefined);
    this.adapters = configured.length > 0 ? configured : [consoleAdapter];
  }

  /**
   * Get the singleton instance
   */
  public static getInstance(): LogManager {
    if (!LogManager.instance) {
      LogManager.instance = new LogManager();
    }
    return LogManager.instance;
  }

  public getInstanceId(): string {
    return this.instanceId;
  }

  public setLogLevel(level: LogLevel): void {
    setLogLevel(level);
  }

  public getLogLevel(): LogLevel {
    return getLogLevel();
  }

  public setComponentLogLevel(component: string, level: LogLevel): void {
    setLogLevel(level, component);
  }

  public addAdapter(adapter: ILogAdapter): void {
    this.adapters.push(adapter);
  }

  public removeAdapter(adapter: ILogAdapter): void {
    this.adapters = this.adapters.filter(a => a !== adapter);
  }

  /**
   * Replace every adapter, e.g. to silence console output in tests
   */
  public setAdapters(adapters: ILogAdapter[]): void {
    this.adapters = [...adapters];
  }

  /**
   * Safely stringify an object, handling circular references and large objects
   */
  public safeStringify(obj: unknown, indent: number = 2): string {
    const MAX_ARRAY_LENGTH = 10;
    const TRUNCATE_LENGTH = 100;
    const seen = new WeakSet<object>();

    return JSON.stringify(obj, function (_key: string, value: unknown) {
      if (typeof value === 'function') {
        return '[Omitted]';
      }
      if (typeof value === 'string') {
        return value.length > TRUNCATE_LENGTH ? value.slice(0, TRUNCATE_LENGTH) + '...' : value;
      }
      if (value instanceof Error) {
        return {
          name: value.name,
          message: value.message,
          stack: value.stack?.split('\n').slice(0, 3).join('\n')
        };
      }
      if (value instanceof Map) {
        return `[Map(${value.size})]`;
      }
      if (value instanceof Set) {
        return `[Set(${value.size})]`;
      }
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) {
          return '[Circular]';
        }
        seen.add(value);
        if (Array.isArray(value) && value.length > MAX_ARRAY_LENGTH) {
          return [...value.slice(0, MAX_ARRAY_LENGTH), `...${value.length - MAX_ARRAY_LENGTH} more items`];
        }
      }
      return value;
    }, indent);
  }

  private formatLogEntry(entry: LogEntry): string {
    let dataStr = '';
    if (entry.data !== undefined) {
      try {
        dataStr = ' ' + this.safeStringify(entry.data, 0);
      } catch {
        dataStr = ' [Error stringifying data]';
      }
    }
    return `[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.source}] ${entry.message}${dataStr}`;
  }

  private addLog(level: LogEntryLevel, source: string, message: string, data?: unknown, context?: LogContext): void {
    if (!isLogLevelEnabled(source, level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      source,
      message,
      data,
      context
    };

    this.logs.push(entry);
    if (this.logs.length > this.MAX_LOGS) {
      this.logs = this.logs.slice(-this.MAX_LOGS);
    }

    for (const adapter of this.adapters) {
      adapter.log(entry);
    }
  }

  public debug(source: string, message: string, data?: unknown, context?: LogContext): void {
    this.addLog('debug', source, message, data, context);
  }

  public info(source: string, message: string, data?: unknown, context?: LogContext): void {
    this.addLog('info', source, message, data, context);
  }

  public warn(source: string, message: string, data?: unknown, context?: LogContext): void {
    this.addLog('warn', source, message, data, context);
  }

  public error(source: string, message: string, data?: unknown, context?: LogContext): void {
    this.addLog('error', source, message, data, context);
  }

  public getLogs(): LogEntry[] {
    return [...this.logs];
  }

  public clearLogs(): void {
    this.logs = [];
  }

  /**
   * Write the buffered log entries to a text file
   */
  public exportLogs(filePath: string): void {
    const content = this.logs.map(entry => this.formatLogEntry(entry)).join('\n');
    writeFileSync(filePath, content + '\n', 'utf8');
  }
}
