import { BatonBaseError } from './BatonBaseError.js';
import { ErrorScope, ErrorType } from './types.js';

/**
 * Runtime error with a stable code, a functional scope and an HTTP-mappable type.
 * Created through the per-module error factories rather than directly.
 */
export class BatonRuntimeError<C = Record<string, unknown>> extends BatonBaseError {
    constructor(
        public readonly code: string,
        public readonly scope: ErrorScope | string,
        public readonly type: ErrorType,
        message: string,
        public readonly context?: C,
        public readonly recovery?: string | string[],
        traceId?: string
    ) {
        super(message, traceId);
    }

    toJSON(): Record<string, unknown> {
        return {
            code: this.code,
            message: this.message,
            scope: this.scope,
            type: this.type,
            context: this.context,
            recovery: this.recovery,
            traceId: this.traceId,
        };
    }
}
