export type { DirectiveGenerator, DirectiveRequest } from './types.js';
export { LlmDirectiveGenerator, createLanguageModel, OPENROUTER_BASE_URL } from './llm-generator.js';
export type { LlmDirectiveGeneratorOptions } from './llm-generator.js';
export { LlmError, mapProviderError, isRetryableLlmError } from './errors.js';
export type { LlmErrorContext } from './errors.js';
export { LlmErrorCode } from './error-codes.js';
export { withRetry, computeBackoffDelay } from './retry.js';
export type { RetryOptions } from './retry.js';
