/**
 * Order command error codes
 */
export enum OrderErrorCode {
    REQUEST_FAILED = 'order_request_failed',
    INVALID_RESPONSE = 'order_invalid_response',
}
