/**
 * Task context error codes
 */
export enum TaskContextErrorCode {
    MISSING_TOKEN = 'context_missing_token',
    MISSING_VALUE = 'context_missing_value',
    FILE_NOT_FOUND = 'context_file_not_found',
    FILE_PARSE_ERROR = 'context_file_parse_error',
}
