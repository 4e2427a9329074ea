import { redactSensitiveData } from './redactor.js';

/**
 * Safe stringify that handles circular references and BigInt.
 * Also redacts credentials so payloads can be logged.
 *
 * @param maxLen - Optional maximum length. If provided, truncates with '…(truncated)' suffix.
 */
export function safeStringify(value: unknown, maxLen?: number): string {
    try {
        if (typeof value === 'bigint') {
            return value.toString();
        }
        const redacted = redactSensitiveData(value);
        const str = JSON.stringify(redacted, (_, v: unknown) => {
            if (v instanceof Error) {
                return { name: v.name, message: v.message, stack: v.stack };
            }
            if (typeof v === 'bigint') return v.toString();
            return v;
        });
        if (typeof str === 'string') {
            if (maxLen !== undefined && maxLen > 0 && str.length > maxLen) {
                const indicator = '…(truncated)';
                if (maxLen <= indicator.length) {
                    return str.slice(0, maxLen);
                }
                return `${str.slice(0, maxLen - indicator.length)}${indicator}`;
            }
            return str;
        }
        return String(value);
    } catch {
        try {
            return String(value);
        } catch {
            return '[Unserializable value]';
        }
    }
}
