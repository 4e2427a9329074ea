/**
 * Logger Factory
 *
 * Bridges validated configuration (LoggerConfig) and the BatonLogger implementation.
 */

import type { LoggerConfig } from './schemas.js';
import type { Logger, LogLevel } from './types.js';
import { LOG_LEVELS, LogComponent } from './types.js';
import { BatonLogger } from './baton-logger.js';
import { createTransports } from './transport-factory.js';
import { LoggerError } from './errors.js';

export interface CreateLoggerOptions {
    config: LoggerConfig;
    /** Identifies the run across interleaved output */
    runId: string;
    /** Defaults to ORCHESTRATION */
    component?: LogComponent;
}

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parse a level name, rejecting anything outside LOG_LEVELS
 */
export function parseLogLevel(value: string): LogLevel {
    const normalized = value.trim().toLowerCase();
    if (!isLogLevel(normalized)) {
        throw LoggerError.invalidLogLevel(value, LOG_LEVELS);
    }
    return normalized;
}

/**
 * Create a logger from configuration.
 * BATON_LOG_LEVEL, when set, overrides the configured level.
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   config: validatedConfig.logger,
 *   runId: 'research-1',
 *   component: LogComponent.ORCHESTRATION,
 * });
 * logger.info('Conductor started');
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
    const { config, runId, component = LogComponent.ORCHESTRATION } = options;
    const envLevel = process.env.BATON_LOG_LEVEL;
    const level = envLevel ? parseLogLevel(envLevel) : config.level;

    return new BatonLogger({
        level,
        component,
        runId,
        transports: createTransports(config.transports),
    });
}
