/**
 * Log levels, in increasing severity
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
}

export const LogLevelSeverity: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.FATAL]: 50,
};

/**
 * Log categories (phase-based, not feature-based)
 *
 * - 'system': Engine lifecycle, configuration, plugin registration
 * - 'analysis': Loading, validation, planning
 * - 'runtime': Workflow execution (stages, retries, jumps, breaker)
 */
export enum LogCategory {
  SYSTEM = 'system',
  ANALYSIS = 'analysis',
  RUNTIME = 'runtime',
}

export type EngineLogFormat = 'pretty' | 'text' | 'json';

/**
 * Receives each formatted line. Defaults to console output.
 */
export type LogSink = (line: string, level: LogLevel) => void;

/**
 * Structured engine log entry
 */
export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  category: LogCategory;
  source: string;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Engine logger configuration
 */
export interface EngineLoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  format?: EngineLogFormat;
  colors?: boolean;
  timestamp?: boolean;
  /** Source identifier printed with each line */
  source?: string;
  category?: LogCategory;
  sink?: LogSink;
  /** Entries kept in memory for exportLogs(); 0 disables the buffer */
  maxEntries?: number;
}
