/**
 * Directive generation error codes
 */
export enum LlmErrorCode {
    RATE_LIMIT_EXCEEDED = 'llm_rate_limit_exceeded',
    OVERLOADED = 'llm_overloaded',
    TIMEOUT = 'llm_timeout',
    GENERATION_FAILED = 'llm_generation_failed',
    EMPTY_RESPONSE = 'llm_empty_response',
}
