import { APICallError } from 'ai';
import { BatonRuntimeError, ErrorScope, ErrorType, toError } from '@baton/core';
import type { LlmProvider } from '@baton/core';
import { LlmErrorCode } from './error-codes.js';

export interface LlmErrorContext {
    provider: LlmProvider;
    model: string;
    status?: number;
    body?: string;
    retryAfter?: number;
}

const OVERLOADED = /overloaded/i;

/**
 * Directive generation error factory methods
 */
export class LlmError {
    private constructor() {}

    static rateLimitExceeded(context: LlmErrorContext) {
        return new BatonRuntimeError<LlmErrorContext>(
            LlmErrorCode.RATE_LIMIT_EXCEEDED,
            ErrorScope.LLM,
            ErrorType.RATE_LIMIT,
            `Rate limit exceeded for ${context.provider}${context.body ? ` - ${context.body}` : ''}`,
            context,
            context.retryAfter !== undefined
                ? `Wait ${context.retryAfter} seconds before retrying`
                : 'Wait before retrying or raise llm.retry.maxAttempts'
        );
    }

    static overloaded(context: LlmErrorContext) {
        return new BatonRuntimeError<LlmErrorContext>(
            LlmErrorCode.OVERLOADED,
            ErrorScope.LLM,
            ErrorType.THIRD_PARTY,
            `${context.provider} is overloaded${context.status !== undefined ? ` (HTTP ${context.status})` : ''}`,
            context
        );
    }

    static timeout(context: LlmErrorContext) {
        return new BatonRuntimeError<LlmErrorContext>(
            LlmErrorCode.TIMEOUT,
            ErrorScope.LLM,
            ErrorType.TIMEOUT,
            `Provider timed out${context.body ? ` - ${context.body}` : ''}`,
            context
        );
    }

    static generationFailed(context: LlmErrorContext) {
        return new BatonRuntimeError<LlmErrorContext>(
            LlmErrorCode.GENERATION_FAILED,
            ErrorScope.LLM,
            ErrorType.THIRD_PARTY,
            `Provider error ${context.status ?? 'unknown'}${context.body ? ` - ${context.body}` : ''}`,
            context
        );
    }

    static emptyResponse(provider: LlmProvider, model: string) {
        return new BatonRuntimeError<LlmErrorContext>(
            LlmErrorCode.EMPTY_RESPONSE,
            ErrorScope.LLM,
            ErrorType.THIRD_PARTY,
            `${provider} returned an empty directive for model '${model}'`,
            { provider, model }
        );
    }
}

function parseRetryAfter(headers: Record<string, string> | undefined): number | undefined {
    const value = headers?.['retry-after'];
    if (value === undefined) return undefined;
    const seconds = Number(value);
    return Number.isFinite(seconds) ? seconds : undefined;
}

/**
 * Map a provider failure to an LlmError. Anything that is not an API call
 * failure comes back as a plain Error, unless it reports an overload.
 */
export function mapProviderError(error: unknown, provider: LlmProvider, model: string): Error {
    if (APICallError.isInstance(error)) {
        const status = error.statusCode;
        const body = error.responseBody ?? error.message;
        const retryAfter = parseRetryAfter(error.responseHeaders);
        const context: LlmErrorContext = {
            provider,
            model,
            ...(status !== undefined && { status }),
            ...(body.length > 0 && { body }),
            ...(retryAfter !== undefined && { retryAfter }),
        };

        if (status === 429) return LlmError.rateLimitExceeded(context);
        if (status === 503 || status === 529 || OVERLOADED.test(body)) {
            return LlmError.overloaded(context);
        }
        if (status === 408) return LlmError.timeout(context);
        return LlmError.generationFailed(context);
    }

    const normalized = toError(error);
    if (OVERLOADED.test(normalized.message)) {
        return LlmError.overloaded({ provider, model, body: normalized.message });
    }
    return normalized;
}

/**
 * Only overload and rate-limit failures are worth another attempt
 */
export function isRetryableLlmError(error: unknown): boolean {
    return (
        error instanceof BatonRuntimeError &&
        (error.code === LlmErrorCode.RATE_LIMIT_EXCEEDED || error.code === LlmErrorCode.OVERLOADED)
    );
}
