import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import { generateText } from 'ai';
import type { LanguageModel } from 'ai';
import { BatonRuntimeError, LogComponent } from '@baton/core';
import type { LlmConfig, Logger } from '@baton/core';
import { LlmErrorCode } from './error-codes.js';
import { LlmError, isRetryableLlmError, mapProviderError } from './errors.js';
import { withRetry } from './retry.js';
import type { DirectiveGenerator, DirectiveRequest } from './types.js';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export interface LlmDirectiveGeneratorOptions {
    /** Replaces the retry sleep, mainly for tests */
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

export function createLanguageModel(config: LlmConfig): LanguageModel {
    const { provider, model, apiKey, baseURL } = config;
    switch (provider) {
        case 'anthropic':
            return createAnthropic({ apiKey, ...(baseURL !== undefined && { baseURL }) })(model);
        case 'openai':
            return createOpenAI({ apiKey, ...(baseURL !== undefined && { baseURL }) })(model);
        case 'openrouter':
            // OpenRouter speaks chat completions only
            return createOpenAI({ apiKey, baseURL: baseURL ?? OPENROUTER_BASE_URL }).chat(model);
        default: {
            const _exhaustive: never = provider;
            throw new Error(`Unsupported provider: ${String(_exhaustive)}`);
        }
    }
}

function retryAfterMs(error: unknown): number | undefined {
    if (
        error instanceof BatonRuntimeError &&
        error.code === LlmErrorCode.RATE_LIMIT_EXCEEDED &&
        typeof error.context?.retryAfter === 'number'
    ) {
        return error.context.retryAfter * 1000;
    }
    return undefined;
}

/**
 * Directive generator backed by the `ai` SDK.
 *
 * SDK retries are disabled; overload and rate-limit failures are retried here
 * with the configured backoff, everything else surfaces on the first failure.
 */
export class LlmDirectiveGenerator implements DirectiveGenerator {
    private readonly model: LanguageModel;
    private readonly logger: Logger;

    constructor(
        private readonly config: LlmConfig,
        logger: Logger,
        private readonly options: LlmDirectiveGeneratorOptions = {}
    ) {
        this.model = createLanguageModel(config);
        this.logger = logger.createChild(LogComponent.LLM);
    }

    async generate(request: DirectiveRequest): Promise<string> {
        const { provider, model, retry } = this.config;

        return withRetry(
            async (attempt) => {
                this.logger.debug(`Requesting directive from ${provider}/${model}`, {
                    attempt: attempt + 1,
                    promptLength: request.prompt.length,
                });

                let text: string;
                try {
                    const result = await generateText({
                        model: this.model,
                        system: request.system,
                        prompt: request.prompt,
                        temperature: this.config.temperature,
                        maxOutputTokens: this.config.maxOutputTokens,
                        maxRetries: 0,
                    });
                    text = result.text;
                } catch (error) {
                    throw mapProviderError(error, provider, model);
                }

                if (text.trim().length === 0) {
                    throw LlmError.emptyResponse(provider, model);
                }
                return text;
            },
            {
                ...retry,
                shouldRetry: isRetryableLlmError,
                retryAfterMs,
                logger: this.logger,
                label: `Directive request to ${provider}`,
                ...(this.options.sleep && { sleep: this.options.sleep }),
                ...(this.options.random && { random: this.options.random }),
            }
        );
    }
}
