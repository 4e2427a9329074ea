/**
 * Redacts credentials from values before they reach a log transport.
 * - By field name (apiKey, authToken, authorization, ...)
 * - By value pattern (Bearer tokens, sk- style keys)
 * - Inline file bytes are replaced by a size marker
 */

const SENSITIVE_FIELDS = [
    'apikey',
    'api_key',
    'token',
    'authtoken',
    'auth_token',
    'access_token',
    'authorization',
    'password',
    'secret',
];

const SENSITIVE_PATTERNS: RegExp[] = [
    /\bsk-[A-Za-z0-9-_]{20,}\b/g,
    /\bBearer\s+[A-Za-z0-9\-_.=]+/gi,
];

const FILE_BYTES_FIELDS = ['bytes', 'base64'];
const MAX_INLINE_BYTES = 1000;

const REDACTED = '[REDACTED]';
const REDACTED_CIRCULAR = '[REDACTED_CIRCULAR]';
const FILE_DATA_TRUNCATED = '[FILE_DATA_TRUNCATED]';

export function redactSensitiveData(input: unknown, seen = new WeakSet<object>()): unknown {
    if (typeof input === 'string') {
        let result = input;
        for (const pattern of SENSITIVE_PATTERNS) {
            result = result.replace(pattern, REDACTED);
        }
        return result;
    }
    if (Array.isArray(input)) {
        if (seen.has(input)) return REDACTED_CIRCULAR;
        seen.add(input);
        return input.map((item) => redactSensitiveData(item, seen));
    }
    if (input && typeof input === 'object') {
        if (seen.has(input)) return REDACTED_CIRCULAR;
        seen.add(input);
        const result: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(input)) {
            const lowerKey = key.toLowerCase();
            if (SENSITIVE_FIELDS.includes(lowerKey)) {
                result[key] = REDACTED;
            } else if (
                FILE_BYTES_FIELDS.includes(lowerKey) &&
                typeof value === 'string' &&
                value.length > MAX_INLINE_BYTES
            ) {
                result[key] = `${FILE_DATA_TRUNCATED} (${value.length} chars)`;
            } else {
                result[key] = redactSensitiveData(value, seen);
            }
        }
        return result;
    }
    return input;
}
