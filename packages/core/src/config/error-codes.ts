/**
 * Config-specific error codes
 * File operations and parsing; schema violations surface as BatonValidationError
 */
export enum ConfigErrorCode {
    FILE_NOT_FOUND = 'config_file_not_found',
    FILE_READ_ERROR = 'config_file_read_error',
    PARSE_ERROR = 'config_parse_error',
}
