import { describe, it, expect } from 'vitest';
import { APICallError } from 'ai';
import { ErrorType } from '@baton/core';
import { LlmErrorCode } from './error-codes.js';
import { LlmError, isRetryableLlmError, mapProviderError } from './errors.js';

function apiError(statusCode: number, responseBody?: string, headers: Record<string, string> = {}) {
    return new APICallError({
        message: `HTTP ${statusCode}`,
        url: 'https://llm.test/v1/messages',
        requestBodyValues: {},
        statusCode,
        responseHeaders: headers,
        ...(responseBody !== undefined && { responseBody }),
    });
}

describe('mapProviderError', () => {
    it('should map 429 to a rate limit error with retry-after', () => {
        const error = mapProviderError(
            apiError(429, 'slow down', { 'retry-after': '30' }),
            'anthropic',
            'claude-test'
        );

        expect(error).toMatchObject({
            code: LlmErrorCode.RATE_LIMIT_EXCEEDED,
            type: ErrorType.RATE_LIMIT,
            message: 'Rate limit exceeded for anthropic - slow down',
            context: {
                provider: 'anthropic',
                model: 'claude-test',
                status: 429,
                body: 'slow down',
                retryAfter: 30,
            },
            recovery: 'Wait 30 seconds before retrying',
        });
    });

    it('should map 503 and 529 to overloaded', () => {
        expect(mapProviderError(apiError(529, 'busy'), 'anthropic', 'm')).toMatchObject({
            code: LlmErrorCode.OVERLOADED,
            message: 'anthropic is overloaded (HTTP 529)',
        });
        expect(mapProviderError(apiError(503, 'busy'), 'openai', 'm')).toMatchObject({
            code: LlmErrorCode.OVERLOADED,
        });
    });

    it('should recognise an overloaded body on other statuses', () => {
        const error = mapProviderError(
            apiError(500, '{"type":"overloaded_error"}'),
            'openrouter',
            'm'
        );
        expect(error).toMatchObject({ code: LlmErrorCode.OVERLOADED });
    });

    it('should map 408 to a timeout', () => {
        expect(mapProviderError(apiError(408, 'Request timeout'), 'openai', 'm')).toMatchObject({
            code: LlmErrorCode.TIMEOUT,
            type: ErrorType.TIMEOUT,
            message: 'Provider timed out - Request timeout',
        });
    });

    it('should map anything else to a third-party failure', () => {
        expect(mapProviderError(apiError(400, 'bad request'), 'openai', 'm')).toMatchObject({
            code: LlmErrorCode.GENERATION_FAILED,
            type: ErrorType.THIRD_PARTY,
            message: 'Provider error 400 - bad request',
        });
    });

    it('should fall back to the error message without a body', () => {
        expect(mapProviderError(apiError(400), 'openai', 'm')).toMatchObject({
            message: 'Provider error 400 - HTTP 400',
            context: { body: 'HTTP 400' },
        });
    });

    it('should treat a plain overloaded error as overloaded', () => {
        expect(mapProviderError(new Error('Model overloaded'), 'anthropic', 'm')).toMatchObject({
            code: LlmErrorCode.OVERLOADED,
            context: { body: 'Model overloaded' },
        });
    });

    it('should pass other errors through', () => {
        const original = new Error('boom');
        expect(mapProviderError(original, 'anthropic', 'm')).toBe(original);
        expect(mapProviderError('oops', 'anthropic', 'm').message).toBe('oops');
    });
});

describe('isRetryableLlmError', () => {
    const context = { provider: 'anthropic' as const, model: 'm' };

    it('should retry rate limits and overloads only', () => {
        expect(isRetryableLlmError(LlmError.rateLimitExceeded(context))).toBe(true);
        expect(isRetryableLlmError(LlmError.overloaded(context))).toBe(true);
        expect(isRetryableLlmError(LlmError.timeout(context))).toBe(false);
        expect(isRetryableLlmError(LlmError.generationFailed(context))).toBe(false);
        expect(isRetryableLlmError(new Error('overloaded'))).toBe(false);
    });
});
