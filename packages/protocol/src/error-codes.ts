/**
 * Protocol-specific error codes
 * Transport failures, malformed responses, remote JSON-RPC errors and task deadlines
 */
export enum ProtocolErrorCode {
    // Transport
    REQUEST_FAILED = 'protocol_request_failed',
    HTTP_ERROR = 'protocol_http_error',
    REQUEST_TIMEOUT = 'protocol_request_timeout',

    // Response
    INVALID_JSON = 'protocol_invalid_json',
    MALFORMED_RESPONSE = 'protocol_malformed_response',
    REMOTE_ERROR = 'protocol_remote_error',

    // Task lifecycle
    TASK_TIMEOUT = 'protocol_task_timeout',
}
