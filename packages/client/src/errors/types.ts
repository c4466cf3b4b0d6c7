import type { ConfigErrorCode } from '../config/error-codes.js';
import type { TaskContextErrorCode } from '../context/error-codes.js';
import type { LoggerErrorCode } from '../logger/error-codes.js';
import type { TransportErrorCode } from '../transport/error-codes.js';

/**
 * Error scopes representing functional domains of the SDK
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    TRANSPORT = 'transport', // HTTP calls against the orchestration API
    CONTEXT = 'context', // Task context values (token, trace ids)
    CONFIG = 'config', // Client configuration loading and validation
    ENVELOPE = 'envelope', // wo_status / wo_comment / wo_newparams payloads
    REPORTER = 'reporter', // Task completion reporting
    LOGGER = 'logger', // Logging system operations and transports
    ORDER = 'order', // Order command endpoints
}

/**
 * Error types describing the nature of the error
 */
export enum ErrorType {
    USER = 'user', // bad input, config errors, validation failures
    NOT_FOUND = 'not_found', // missing file or context value
    TIMEOUT = 'timeout', // call exceeded its timeout
    THIRD_PARTY = 'third_party', // orchestration API answered with an error
    SYSTEM = 'system', // network failures, unexpected states
}

/**
 * Union type for all error codes across domains
 */
export type MsaErrorCode =
    | ConfigErrorCode
    | TaskContextErrorCode
    | LoggerErrorCode
    | TransportErrorCode;

/** Severity of an issue */
export type Severity = 'error' | 'warning';

/** Generic issue type for validation results */
export interface Issue<C = unknown> {
    code: MsaErrorCode | string;
    message: string;
    scope: ErrorScope | string;
    type: ErrorType;
    severity: Severity;
    path?: Array<string | number>;
    context?: C;
}
