/**
 * JSON-RPC 2.0 Type Definitions
 *
 * Envelope types for the A2A protocol transport.
 * @see https://www.jsonrpc.org/specification
 */

/**
 * JSON-RPC 2.0 Request
 */
export interface JsonRpcRequest<P = unknown> {
    /** JSON-RPC version (must be "2.0") */
    jsonrpc: '2.0';
    /** Method name to invoke */
    method: string;
    /** Method parameters */
    params: P;
    /** Request ID, echoed by the response */
    id: string | number;
}

/**
 * JSON-RPC 2.0 Error Object
 */
export interface JsonRpcError {
    /** Error code (integer) */
    code: number;
    /** Error message (short description) */
    message: string;
    /** Optional additional error data */
    data?: unknown;
}

/**
 * JSON-RPC 2.0 Response (Success)
 */
export interface JsonRpcSuccessResponse<R = unknown> {
    jsonrpc: '2.0';
    result: R;
    id: string | number | null;
}

/**
 * JSON-RPC 2.0 Response (Error)
 */
export interface JsonRpcErrorResponse {
    jsonrpc: '2.0';
    error: JsonRpcError;
    /** Request ID, or null if the server could not determine it */
    id: string | number | null;
}

export type JsonRpcResponse<R = unknown> = JsonRpcSuccessResponse<R> | JsonRpcErrorResponse;

/**
 * Standard JSON-RPC 2.0 Error Codes
 */
export enum JsonRpcErrorCode {
    /** Invalid JSON was received by the server */
    PARSE_ERROR = -32700,
    /** The JSON sent is not a valid Request object */
    INVALID_REQUEST = -32600,
    /** The method does not exist / is not available */
    METHOD_NOT_FOUND = -32601,
    /** Invalid method parameter(s) */
    INVALID_PARAMS = -32602,
    /** Internal JSON-RPC error */
    INTERNAL_ERROR = -32603,
}

/**
 * A2A-specific error codes (implementation-defined server error range)
 */
export enum A2AErrorCode {
    TASK_NOT_FOUND = -32001,
    TASK_NOT_CANCELABLE = -32002,
    PUSH_NOTIFICATION_NOT_SUPPORTED = -32003,
    UNSUPPORTED_OPERATION = -32004,
    CONTENT_TYPE_NOT_SUPPORTED = -32005,
    INVALID_AGENT_RESPONSE = -32006,
}

/**
 * A2A method names used by the client
 */
export const A2A_METHODS = {
    SEND_MESSAGE: 'message/send',
    GET_TASK: 'tasks/get',
    CANCEL_TASK: 'tasks/cancel',
    LIST_TASKS: 'tasks/list',
} as const;

export type A2AMethod = (typeof A2A_METHODS)[keyof typeof A2A_METHODS];

export function isJsonRpcError(response: JsonRpcResponse): response is JsonRpcErrorResponse {
    return 'error' in response;
}
