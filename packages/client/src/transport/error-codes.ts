/**
 * Transport error codes
 */
export enum TransportErrorCode {
    INVALID_PAYLOAD = 'transport_invalid_payload',
    NETWORK_ERROR = 'transport_network_error',
    TIMEOUT = 'transport_timeout',
    INVALID_TIMEOUT = 'transport_invalid_timeout',
    REMOTE_ERROR = 'transport_remote_error',
    FETCH_UNAVAILABLE = 'transport_fetch_unavailable',
}
