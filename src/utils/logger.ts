/**
 * Leveled console logging.
 *
 * Each module takes its own logger from `createLogger`. The minimum level is
 * process-wide and read from LOG_LEVEL when this module loads.
 *
 * @module utils/logger
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  timestamp: string;
  level: LogLevelName;
  module: string;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerConfig {
  minLevel: LogLevel;
  includeTimestamp?: boolean;
  /** Replaces console output, e.g. to collect entries in tests */
  outputHandler?: (entry: LogEntry) => void;
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: LogLevel.INFO,
  includeTimestamp: true,
};

let globalConfig: LoggerConfig = { ...DEFAULT_CONFIG };

export function parseLogLevel(level: string | undefined): LogLevel {
  switch (level?.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
    case 'none':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

const LEVEL_NAMES: Record<LogLevel, LogLevelName> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
  [LogLevel.SILENT]: 'silent',
};

export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

export function configureFromEnvironment(): void {
  const envLevel = process.env.LOG_LEVEL;
  if (envLevel) {
    globalConfig.minLevel = parseLogLevel(envLevel);
  }
}

export function setLogLevel(level: LogLevel | LogLevelName): void {
  globalConfig.minLevel = typeof level === 'string' ? parseLogLevel(level) : level;
}

export function formatLogEntry(entry: LogEntry, includeTimestamp: boolean = true): string {
  const parts: string[] = [];

  if (includeTimestamp) {
    parts.push(`[${entry.timestamp}]`);
  }

  parts.push(`[${entry.level.toUpperCase()}]`);
  parts.push(`[${entry.module}]`);
  parts.push(entry.message);

  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context));
  }

  return parts.join(' ');
}

function consoleOutput(entry: LogEntry): void {
  const output = formatLogEntry(entry, globalConfig.includeTimestamp ?? true);

  switch (entry.level) {
    case 'error':
      console.error(output);
      if (entry.error) {
        console.error(entry.error);
      }
      break;
    case 'warn':
      console.warn(output);
      break;
    case 'debug':
      console.debug(output);
      break;
    default:
      console.log(output);
  }
}

export class Logger {
  private module: string;
  private overrides: Partial<LoggerConfig>;

  constructor(module: string, overrides: Partial<LoggerConfig> = {}) {
    this.module = module;
    this.overrides = overrides;
  }

  // Read per call so setLogLevel applies to loggers created at import time
  private get config(): LoggerConfig {
    return { ...globalConfig, ...this.overrides };
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    const config = this.config;
    if (level < config.minLevel) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      module: this.module,
      message,
      context,
      error,
    };
    (config.outputHandler ?? consoleOutput)(entry);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  child(subModule: string): Logger {
    return new Logger(`${this.module}:${subModule}`, this.overrides);
  }

  withContext(fixedContext: Record<string, unknown>): LoggerWithContext {
    return new LoggerWithContext(this, fixedContext);
  }
}

export class LoggerWithContext {
  constructor(
    private logger: Logger,
    private fixedContext: Record<string, unknown>
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(message, { ...this.fixedContext, ...context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(message, { ...this.fixedContext, ...context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(message, { ...this.fixedContext, ...context });
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.logger.error(message, error, { ...this.fixedContext, ...context });
  }
}

export function createLogger(module: string): Logger {
  return new Logger(module);
}

export function createSilentLogger(module: string): Logger {
  return new Logger(module, { minLevel: LogLevel.SILENT });
}

configureFromEnvironment();
