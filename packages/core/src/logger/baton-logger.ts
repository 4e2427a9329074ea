/**
 * Baton Logger
 *
 * Multi-transport structured logger with component-based categorization.
 */

import type { Logger, LoggerTransport, LogEntry, LogLevel, LogComponent } from './types.js';
import { FileTransport } from './transports/file-transport.js';

export interface BatonLoggerConfig {
    level: LogLevel;
    component: LogComponent;
    runId: string;
    transports: LoggerTransport[];
}

/**
 * Level is held in a shared box so that setLevel on a parent reaches its children
 */
interface LevelRef {
    current: LogLevel;
}

export class BatonLogger implements Logger {
    private readonly levelRef: LevelRef;
    private readonly component: LogComponent;
    private readonly runId: string;
    private readonly transports: LoggerTransport[];

    // Lower number = more severe. 'debug' records error, warn, info and debug but not silly
    private static readonly LEVELS: Record<LogLevel, number> = {
        error: 0,
        warn: 1,
        info: 2,
        debug: 3,
        silly: 4,
    };

    constructor(config: BatonLoggerConfig, levelRef?: LevelRef) {
        this.levelRef = levelRef ?? { current: config.level };
        this.component = config.component;
        this.runId = config.runId;
        this.transports = config.transports;
    }

    debug(message: string, context?: Record<string, unknown>): void {
        this.log('debug', message, context);
    }

    silly(message: string, context?: Record<string, unknown>): void {
        this.log('silly', message, context);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.log('warn', message, context);
    }

    error(message: string, context?: Record<string, unknown>): void {
        this.log('error', message, context);
    }

    trackException(error: Error, context?: Record<string, unknown>): void {
        this.error(error.message, {
            ...context,
            errorName: error.name,
            errorStack: error.stack,
            errorType: error.constructor.name,
        });
    }

    private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        if (!this.shouldLog(level)) {
            return;
        }

        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.component,
            runId: this.runId,
            context,
        };

        for (const transport of this.transports) {
            try {
                const pending = transport.write(entry);
                if (pending instanceof Promise) {
                    pending.catch((error: unknown) => {
                        console.error('Logger transport error:', error);
                    });
                }
            } catch (error) {
                // A failing transport must not break the caller
                console.error('Logger transport error:', error);
            }
        }
    }

    private shouldLog(level: LogLevel): boolean {
        return BatonLogger.LEVELS[level] <= BatonLogger.LEVELS[this.levelRef.current];
    }

    createChild(component: LogComponent): BatonLogger {
        return new BatonLogger(
            {
                level: this.levelRef.current,
                component,
                runId: this.runId,
                transports: this.transports,
            },
            this.levelRef
        );
    }

    setLevel(level: LogLevel): void {
        this.levelRef.current = level;
    }

    getLevel(): LogLevel {
        return this.levelRef.current;
    }

    getLogFilePath(): string | null {
        for (const transport of this.transports) {
            if (transport instanceof FileTransport) {
                return transport.getFilePath();
            }
        }
        return null;
    }

    async destroy(): Promise<void> {
        for (const transport of this.transports) {
            if (transport.destroy) {
                try {
                    await transport.destroy();
                } catch (error) {
                    console.error('Error destroying transport:', error);
                }
            }
        }
    }
}
