/**
 * Silent Transport
 *
 * Discards every entry. Used for nested runs and tests.
 */

import type { LoggerTransport, LogEntry } from '../types.js';

export class SilentTransport implements LoggerTransport {
    write(_entry: LogEntry): void {
        // Intentionally do nothing
    }
}
