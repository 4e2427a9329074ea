import { BatonRuntimeError, ErrorScope, ErrorType } from '@baton/core';
import { ProtocolErrorCode } from './error-codes.js';
import { A2AErrorCode } from './jsonrpc/types.js';
import type { JsonRpcError } from './jsonrpc/types.js';
import type { Task, TaskState } from './types.js';

export interface CommunicationErrorContext {
    endpoint: string;
    method: string;
    status?: number;
    timeoutMs?: number;
    cause?: string;
}

export interface ProtocolErrorContext {
    method: string;
    remoteCode?: number;
    remoteMessage?: string;
    data?: unknown;
    detail?: string;
}

export interface TaskTimeoutErrorContext {
    taskId: string;
    maxWaitMs: number;
    lastState: TaskState;
}

/**
 * Transport-level failure: the request never produced a usable HTTP response
 */
export class CommunicationError extends BatonRuntimeError<CommunicationErrorContext> {
    constructor(
        code: ProtocolErrorCode,
        type: ErrorType,
        message: string,
        context: CommunicationErrorContext,
        recovery?: string
    ) {
        super(code, ErrorScope.PROTOCOL, type, message, context, recovery);
    }
}

/**
 * The agent answered, but not with a usable JSON-RPC result
 */
export class ProtocolError extends BatonRuntimeError<ProtocolErrorContext> {
    constructor(
        code: ProtocolErrorCode,
        type: ErrorType,
        message: string,
        context: ProtocolErrorContext,
        recovery?: string
    ) {
        super(code, ErrorScope.PROTOCOL, type, message, context, recovery);
    }

    /** JSON-RPC error code sent by the agent, if any */
    get remoteCode(): number | undefined {
        return this.context?.remoteCode;
    }
}

/**
 * waitFor reached its deadline before the task became terminal
 */
export class TaskTimeoutError extends BatonRuntimeError<TaskTimeoutErrorContext> {
    constructor(
        message: string,
        public readonly lastTask: Task,
        maxWaitMs: number
    ) {
        super(
            ProtocolErrorCode.TASK_TIMEOUT,
            ErrorScope.PROTOCOL,
            ErrorType.TIMEOUT,
            message,
            { taskId: lastTask.id, maxWaitMs, lastState: lastTask.state },
            'Increase protocol.maxWaitMs or query the agent again later'
        );
    }
}

function remoteErrorType(code: number): ErrorType {
    switch (code) {
        case A2AErrorCode.TASK_NOT_FOUND:
            return ErrorType.NOT_FOUND;
        case A2AErrorCode.TASK_NOT_CANCELABLE:
            return ErrorType.CONFLICT;
        case A2AErrorCode.UNSUPPORTED_OPERATION:
        case A2AErrorCode.CONTENT_TYPE_NOT_SUPPORTED:
            return ErrorType.USER;
        default:
            return ErrorType.THIRD_PARTY;
    }
}

function httpErrorType(status: number): ErrorType {
    if (status === 401 || status === 403) return ErrorType.FORBIDDEN;
    if (status === 404) return ErrorType.NOT_FOUND;
    if (status === 408) return ErrorType.TIMEOUT;
    if (status === 429) return ErrorType.RATE_LIMIT;
    return ErrorType.THIRD_PARTY;
}

/**
 * Protocol error factory methods
 */
export class ProtocolErrors {
    private constructor() {}

    static requestFailed(endpoint: string, method: string, cause: string) {
        return new CommunicationError(
            ProtocolErrorCode.REQUEST_FAILED,
            ErrorType.THIRD_PARTY,
            `Request to ${endpoint} failed: ${cause}`,
            { endpoint, method, cause },
            'Check that the agent is running and reachable'
        );
    }

    static httpError(endpoint: string, method: string, status: number, statusText: string) {
        return new CommunicationError(
            ProtocolErrorCode.HTTP_ERROR,
            httpErrorType(status),
            `HTTP ${status}: ${statusText} (${endpoint})`,
            { endpoint, method, status },
            status === 401 || status === 403
                ? 'Check the authToken configured for this agent'
                : undefined
        );
    }

    static requestTimeout(endpoint: string, method: string, timeoutMs: number) {
        return new CommunicationError(
            ProtocolErrorCode.REQUEST_TIMEOUT,
            ErrorType.TIMEOUT,
            `Request to ${endpoint} timed out after ${timeoutMs}ms`,
            { endpoint, method, timeoutMs },
            'Increase protocol.requestTimeoutMs'
        );
    }

    static invalidJson(method: string, detail: string) {
        return new ProtocolError(
            ProtocolErrorCode.INVALID_JSON,
            ErrorType.THIRD_PARTY,
            `Response to ${method} is not valid JSON: ${detail}`,
            { method, detail }
        );
    }

    static malformedResponse(method: string, detail: string) {
        return new ProtocolError(
            ProtocolErrorCode.MALFORMED_RESPONSE,
            ErrorType.THIRD_PARTY,
            `Malformed response to ${method}: ${detail}`,
            { method, detail }
        );
    }

    static remoteError(method: string, error: JsonRpcError) {
        return new ProtocolError(
            ProtocolErrorCode.REMOTE_ERROR,
            remoteErrorType(error.code),
            `Agent returned error ${error.code} for ${method}: ${error.message}`,
            {
                method,
                remoteCode: error.code,
                remoteMessage: error.message,
                ...(error.data !== undefined && { data: error.data }),
            }
        );
    }

    static taskTimeout(task: Task, maxWaitMs: number) {
        return new TaskTimeoutError(
            `Task ${task.id} did not reach a terminal state within ${maxWaitMs}ms (last state: ${task.state})`,
            task,
            maxWaitMs
        );
    }
}
