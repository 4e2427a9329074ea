/**
 * Logger-specific error codes
 */
export enum LoggerErrorCode {
    TRANSPORT_UNKNOWN_TYPE = 'logger_transport_unknown_type',
    INVALID_LOG_LEVEL = 'logger_invalid_log_level',
}
