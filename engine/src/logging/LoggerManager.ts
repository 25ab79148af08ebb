import { LogCategory, LogLevel, type EngineLoggerConfig, type LogEntry } from '../types/log-types.js';
import { EngineLogger } from './EngineLogger.js';

/**
 * Singleton Logger Manager
 *
 * Central access to the process-wide EngineLogger without passing it
 * through every constructor.
 *
 * Usage:
 * ```typescript
 * // In the entry point (WorkflowEngine, CLI)
 * LoggerManager.initialize({ level: LogLevel.DEBUG, format: 'pretty' });
 *
 * // Anywhere else (loaders, resolver, validator)
 * LoggerManager.getLogger().debug('Loaded workflow', { path });
 * ```
 *
 * Until initialize() is called, getLogger() hands out a warn-level text
 * logger so library use without an entry point still reports problems.
 */
export class LoggerManager {
    private static instance: EngineLogger | null = null;
    private static isInitialized = false;

    /**
     * Initialize (or replace) the shared logger
     */
    static initialize(config: Partial<EngineLoggerConfig> = {}): EngineLogger {
        const mergedConfig: EngineLoggerConfig = {
            level: LogLevel.INFO,
            format: 'text',
            colors: true,
            timestamp: true,
            source: 'stageflow',
            category: LogCategory.SYSTEM,
            ...config,
        };

        this.instance = new EngineLogger(mergedConfig);
        this.isInitialized = true;

        this.instance.debug('LoggerManager initialized', {
            level: mergedConfig.level,
            format: mergedConfig.format,
        });

        return this.instance;
    }

    /**
     * Use an existing logger as the shared instance
     */
    static use(logger: EngineLogger): void {
        this.instance = logger;
        this.isInitialized = true;
    }

    static getLogger(): EngineLogger {
        if (!this.instance) {
            this.instance = new EngineLogger({ level: LogLevel.WARN, format: 'text', timestamp: false });
        }
        return this.instance;
    }

    static isReady(): boolean {
        return this.isInitialized && this.instance !== null;
    }

    /**
     * Reset the logger instance (useful for testing)
     */
    static reset(): void {
        this.instance = null;
        this.isInitialized = false;
    }

    static exportLogs(): readonly LogEntry[] {
        return this.instance ? this.instance.exportLogs() : [];
    }
}
