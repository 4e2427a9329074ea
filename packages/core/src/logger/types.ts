/**
 * Logger Types and Interfaces
 *
 * Core abstractions for the multi-transport logger.
 */

/**
 * Log levels in order of severity
 * error < warn < info < debug < silly
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silly';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silly'];

/**
 * Component identifiers for structured logging
 * Mirrors ErrorScope, with additional execution context components
 */
export enum LogComponent {
    CONFIG = 'config',
    LLM = 'llm',
    PROTOCOL = 'protocol',
    REGISTRY = 'registry',
    ORCHESTRATION = 'orchestration',
    EXECUTOR = 'executor',
    WORKFLOW = 'workflow',
}

/**
 * Structured log entry
 * All logs are converted to this format before being sent to transports
 */
export interface LogEntry {
    level: LogLevel;
    message: string;
    /** ISO timestamp */
    timestamp: string;
    component: LogComponent;
    /** Identifies one conductor run or workflow across interleaved output */
    runId: string;
    context?: Record<string, unknown> | undefined;
}

/**
 * Logger type
 * All logger implementations must implement this shape.
 */
export type Logger = {
    debug(message: string, context?: Record<string, unknown>): void;

    /**
     * Most verbose level, for full payload dumps
     */
    silly(message: string, context?: Record<string, unknown>): void;

    info(message: string, context?: Record<string, unknown>): void;

    warn(message: string, context?: Record<string, unknown>): void;

    error(message: string, context?: Record<string, unknown>): void;

    /**
     * Log an error with its name and stack trace
     */
    trackException(error: Error, context?: Record<string, unknown>): void;

    /**
     * Create a child logger for a different component
     * Shares transports, runId and level with the parent
     */
    createChild(component: LogComponent): Logger;

    /**
     * Set the log level dynamically
     * Affects this logger and every child created from it
     */
    setLevel(level: LogLevel): void;

    getLevel(): LogLevel;

    /**
     * @returns Log file path, or null if file logging is not configured
     */
    getLogFilePath(): string | null;

    /**
     * Cleanup resources and close transports
     */
    destroy(): Promise<void>;
};

/**
 * Base transport interface
 */
export type LoggerTransport = {
    write(entry: LogEntry): void | Promise<void>;

    destroy?(): void | Promise<void>;
};
