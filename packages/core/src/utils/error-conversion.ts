/**
 * Utility functions for converting various error types to proper Error instances
 * with meaningful messages instead of "[object Object]"
 */

import { safeStringify } from './safe-stringify.js';

function readStringField(value: object, field: string): string | undefined {
    const candidate: unknown = Reflect.get(value, field);
    return typeof candidate === 'string' ? candidate : undefined;
}

/**
 * Converts any thrown value to an Error instance with a meaningful message
 */
export function toError(error: unknown): Error {
    if (error instanceof Error) {
        return error;
    }

    if (error && typeof error === 'object') {
        for (const field of ['message', 'error', 'details', 'description']) {
            const text = readStringField(error, field);
            if (text !== undefined) {
                return new Error(text, { cause: error });
            }
        }
        return new Error(safeStringify(error, 500), { cause: error });
    }

    if (typeof error === 'string') {
        return new Error(error, { cause: error });
    }

    return new Error(String(error), { cause: error });
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
