/**
 * Engine Logger
 *
 * Structured logging for the engine. Supports pretty, text and json output,
 * level filtering, chalk colours and an in-memory buffer for exportLogs().
 *
 * @module logging
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import {
  LogCategory,
  LogLevel,
  LogLevelSeverity,
  type EngineLogFormat,
  type EngineLoggerConfig,
  type LogEntry,
  type LogSink,
} from '../types/log-types.js';

const DEFAULT_MAX_ENTRIES = 1000;

const consoleSink: LogSink = (line, level) => {
  if (LogLevelSeverity[level] >= LogLevelSeverity[LogLevel.ERROR]) {
    console.error(line);
  } else {
    console.log(line);
  }
};

type ResolvedLoggerConfig = Required<Omit<EngineLoggerConfig, 'sink'>> & { sink: LogSink };

export class EngineLogger {
  private config: ResolvedLoggerConfig;
  private palette: ChalkInstance;
  private entries: LogEntry[] = [];

  constructor(config: EngineLoggerConfig) {
    this.config = {
      level: config.level,
      format: config.format ?? 'text',
      colors: config.colors ?? true,
      timestamp: config.timestamp ?? true,
      source: config.source ?? 'stageflow',
      category: config.category ?? LogCategory.SYSTEM,
      sink: config.sink ?? consoleSink,
      maxEntries: config.maxEntries ?? DEFAULT_MAX_ENTRIES,
    };
    this.palette = this.createPalette(this.config.colors);
  }

  debug(message: string, context?: Record<string, unknown>, category?: LogCategory): void {
    this.log(LogLevel.DEBUG, message, context, undefined, category);
  }

  info(message: string, context?: Record<string, unknown>, category?: LogCategory): void {
    this.log(LogLevel.INFO, message, context, undefined, category);
  }

  warn(message: string, context?: Record<string, unknown>, category?: LogCategory): void {
    this.log(LogLevel.WARN, message, context, undefined, category);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>, category?: LogCategory): void {
    this.log(LogLevel.ERROR, message, context, error, category);
  }

  fatal(message: string, error?: Error, context?: Record<string, unknown>, category?: LogCategory): void {
    this.log(LogLevel.FATAL, message, context, error, category);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
    category?: LogCategory,
  ): void {
    if (!this.willLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      category: category ?? this.config.category,
      source: this.config.source,
      message,
      context,
      error,
    };

    if (this.config.maxEntries > 0) {
      this.entries.push(entry);
      if (this.entries.length > this.config.maxEntries) {
        this.entries.shift();
      }
    }

    this.config.sink(this.format(entry), level);
  }

  private format(entry: LogEntry): string {
    switch (this.config.format) {
      case 'json':
        return JSON.stringify({
          timestamp: entry.timestamp.toISOString(),
          level: entry.level,
          category: entry.category,
          source: entry.source,
          message: entry.message,
          context: entry.context,
          error: entry.error ? { name: entry.error.name, message: entry.error.message } : undefined,
        });
      case 'pretty':
        return this.formatPretty(entry);
      case 'text':
      default:
        return this.formatText(entry);
    }
  }

  private formatText(entry: LogEntry): string {
    const parts: string[] = [];
    if (this.config.timestamp) {
      parts.push(entry.timestamp.toISOString());
    }
    parts.push(`[${entry.level.toUpperCase()}]`, entry.message);
    if (entry.error) {
      parts.push(`- ${entry.error.message}`);
    }
    return parts.join(' ');
  }

  private formatPretty(entry: LogEntry): string {
    const p = this.palette;
    const label = this.colorLevel(entry.level, entry.level.toUpperCase().padEnd(5));
    const prefix = this.config.timestamp ? `${p.gray(entry.timestamp.toISOString())} ` : '';
    let line = `${prefix}${label} ${p.dim(`[${entry.source}]`)} ${entry.message}`;
    if (entry.context && Object.keys(entry.context).length > 0) {
      line += ` ${p.gray(JSON.stringify(entry.context))}`;
    }
    if (entry.error) {
      line += `\n  ${p.red(entry.error.message)}`;
    }
    return line;
  }

  private colorLevel(level: LogLevel, text: string): string {
    const p = this.palette;
    switch (level) {
      case LogLevel.DEBUG:
        return p.gray(text);
      case LogLevel.INFO:
        return p.cyan(text);
      case LogLevel.WARN:
        return p.yellow(text);
      case LogLevel.ERROR:
        return p.red(text);
      case LogLevel.FATAL:
        return p.bgRed.white(text);
    }
  }

  private createPalette(colors: boolean): ChalkInstance {
    return colors ? chalk : new Chalk({ level: 0 });
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  setColors(enabled: boolean): void {
    this.config.colors = enabled;
    this.palette = this.createPalette(enabled);
  }

  setFormat(format: EngineLogFormat): void {
    this.config.format = format;
  }

  willLog(level: LogLevel): boolean {
    return LogLevelSeverity[level] >= LogLevelSeverity[this.config.level];
  }

  /**
   * Buffered entries, oldest first
   */
  exportLogs(): readonly LogEntry[] {
    return [...this.entries];
  }

  clearLogs(): void {
    this.entries = [];
  }

  getConfig(): Readonly<EngineLoggerConfig> {
    return { ...this.config };
  }
}

/**
 * Create a logger from the engine's log level option
 */
export function createEngineLogger(
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent',
  verbose: boolean = false,
  sink?: LogSink,
): EngineLogger | null {
  if (logLevel === 'silent') {
    return null;
  }

  const levelMap: Record<'debug' | 'info' | 'warn' | 'error', LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
  };

  return new EngineLogger({
    level: levelMap[logLevel],
    format: verbose ? 'pretty' : 'text',
    colors: true,
    timestamp: false,
    source: 'stageflow',
    sink,
  });
}
