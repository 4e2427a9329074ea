import { nanoid } from 'nanoid';

/**
 * Base class for all Baton errors
 * Assigns a trace id so a failure can be followed across log lines and serialized payloads
 */
export abstract class BatonBaseError extends Error {
    public readonly traceId: string;

    constructor(message: string, traceId?: string) {
        super(message);
        this.name = new.target.name;
        this.traceId = traceId ?? nanoid();
        Object.setPrototypeOf(this, new.target.prototype);
    }

    abstract toJSON(): Record<string, unknown>;
}
