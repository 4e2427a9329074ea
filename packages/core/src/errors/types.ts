/**
 * Error scopes representing functional domains in the system
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    CONFIG = 'config', // Configuration file loading, parsing, validation
    LOGGER = 'logger', // Logging system transports and configuration
    LLM = 'llm', // Directive generation through language model providers
    PROTOCOL = 'protocol', // JSON-RPC transport and remote task lifecycle
    REGISTRY = 'registry', // Agent descriptor discovery and alias resolution
    ORCHESTRATION = 'orchestration', // Conductor loop, stages, workflow
}

/**
 * Error types that map directly to HTTP status codes
 * Each type represents the nature of the error
 */
export enum ErrorType {
    USER = 'user', // 400 - bad input, config errors, validation failures
    FORBIDDEN = 'forbidden', // 403 - permission denied, unauthorized
    NOT_FOUND = 'not_found', // 404 - resource doesn't exist (task, agent, file)
    TIMEOUT = 'timeout', // 408 - operation timed out
    CONFLICT = 'conflict', // 409 - resource conflict, invalid state transition
    RATE_LIMIT = 'rate_limit', // 429 - too many requests
    SYSTEM = 'system', // 500 - bugs, internal failures, unexpected states
    THIRD_PARTY = 'third_party', // 502 - upstream agent or provider failures
    UNKNOWN = 'unknown', // 500 - unclassified errors, fallback
}

/** Severity of an issue */
export type Severity = 'error' | 'warning';

/** Generic issue type for validation results */
export interface Issue<C = unknown> {
    code: string;
    message: string;
    scope: ErrorScope | string; // Domain that generated this issue
    type: ErrorType; // HTTP status mapping
    severity: Severity;
    path?: Array<string | number>;
    context?: C;
}
