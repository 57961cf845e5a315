import { isDebugEnabled } from '../../utils/logging/debugFlags';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'none';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'none'];
const LOG_LEVEL_NUM: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  none: 5,
};

type Environment = 'development' | 'production' | 'test';

interface LogLevelConfig {
  global: LogLevel;
  modules: Record<string, LogLevel>;
  environment: Environment;
}

function detectEnvironment(): Environment {
  const env = process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

function defaultGlobalLevel(environment: Environment): LogLevel {
  const override = process.env.DRAWING_COMPARE_LOG_LEVEL;
  if (override && isLogLevel(override)) {
    return override;
  }
  switch (environment) {
    case 'production':
      return 'info';
    case 'test':
      return 'warn';
    default:
      return 'debug';
  }
}

const environment = detectEnvironment();

let config: LogLevelConfig = {
  global: defaultGlobalLevel(environment),
  modules: {},
  environment,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function getLogLevel(moduleName?: string): LogLevel {
  if (moduleName && config.modules[moduleName]) {
    return config.modules[moduleName];
  }
  return config.global;
}

export function setLogLevel(level: LogLevel, moduleName?: string): void {
  if (moduleName) {
    config.modules[moduleName] = level;
  } else {
    config.global = level;
  }
}

export function clearModuleLogLevels(): void {
  config = { ...config, modules: {} };
}

export function isLogLevelEnabled(moduleName: string, level: LogLevel): boolean {
  // If debug flag is enabled, treat as minimum 'debug' level
  if (isDebugEnabled(moduleName)) {
    return LOG_LEVEL_NUM[level] >= LOG_LEVEL_NUM.debug;
  }
  const configuredLevel = config.modules[moduleName] ?? config.global;
  return LOG_LEVEL_NUM[level] >= LOG_LEVEL_NUM[configuredLevel];
}
