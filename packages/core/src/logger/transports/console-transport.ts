/**
 * Console Transport
 *
 * Logs to stdout/stderr with optional chalk colors.
 */

import chalk from 'chalk';
import type { LoggerTransport, LogEntry, LogLevel } from '../types.js';
import { redactSensitiveData } from '../../utils/redactor.js';

export interface ConsoleTransportConfig {
    colorize?: boolean;
}

export class ConsoleTransport implements LoggerTransport {
    private colorize: boolean;

    constructor(config: ConsoleTransportConfig = {}) {
        this.colorize = config.colorize ?? true;
    }

    write(entry: LogEntry): void {
        const line = this.format(entry);

        // stderr for errors and warnings, stdout for everything else
        if (entry.level === 'error' || entry.level === 'warn') {
            console.error(line);
        } else {
            console.log(line);
        }
    }

    format(entry: LogEntry): string {
        const timestamp = new Date(entry.timestamp).toLocaleTimeString();
        const component = `[${entry.component}:${entry.runId}]`;
        const levelLabel = `[${entry.level.toUpperCase()}]`;

        let message = `${timestamp} ${levelLabel} ${component} ${entry.message}`;

        if (this.colorize) {
            message = this.getColorForLevel(entry.level)(message);
        }

        if (entry.context && Object.keys(entry.context).length > 0) {
            message += '\n' + JSON.stringify(redactSensitiveData(entry.context), null, 2);
        }

        return message;
    }

    private getColorForLevel(level: LogLevel): (text: string) => string {
        switch (level) {
            case 'silly':
            case 'debug':
                return chalk.gray;
            case 'info':
                return chalk.cyan;
            case 'warn':
                return chalk.yellow;
            case 'error':
                return chalk.red;
        }
    }
}
