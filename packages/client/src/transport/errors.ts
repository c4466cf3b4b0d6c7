import { MsaRuntimeError } from '../errors/MsaRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { TransportErrorCode } from './error-codes.js';
import type { HttpMethod } from './types.js';

/**
 * Transport error factory
 */
export class TransportError {
    /**
     * Request body is not a JSON object; raised before anything is sent
     */
    static invalidPayload(method: HttpMethod, path: string, receivedType: string): MsaRuntimeError {
        return new MsaRuntimeError(
            TransportErrorCode.INVALID_PAYLOAD,
            ErrorScope.TRANSPORT,
            ErrorType.USER,
            `Parameters needs to be a dictionary: ${method} ${path} received ${receivedType}`,
            { method, path, receivedType }
        );
    }

    static networkError(
        method: HttpMethod,
        path: string,
        originalError?: unknown
    ): MsaRuntimeError {
        const reason =
            originalError instanceof Error ? originalError.message : String(originalError);
        return new MsaRuntimeError(
            TransportErrorCode.NETWORK_ERROR,
            ErrorScope.TRANSPORT,
            ErrorType.SYSTEM,
            `Network error calling ${method} ${path}: ${reason}`,
            { method, path, originalError: reason }
        );
    }

    static timeout(method: HttpMethod, path: string, timeoutMs: number): MsaRuntimeError {
        return new MsaRuntimeError(
            TransportErrorCode.TIMEOUT,
            ErrorScope.TRANSPORT,
            ErrorType.TIMEOUT,
            `${method} ${path} timed out after ${timeoutMs}ms`,
            { method, path, timeoutMs }
        );
    }

    static invalidTimeout(method: HttpMethod, path: string, timeoutMs: number): MsaRuntimeError {
        return new MsaRuntimeError(
            TransportErrorCode.INVALID_TIMEOUT,
            ErrorScope.TRANSPORT,
            ErrorType.USER,
            `${method} ${path}: timeout must be a positive number of ms, got ${timeoutMs}`,
            { method, path, timeoutMs },
            'Omit timeoutMs to use the configured default'
        );
    }

    /**
     * Orchestration API answered with a non-2xx status
     */
    static remoteError(
        action: string,
        status: number,
        message: string,
        path: string
    ): MsaRuntimeError {
        return new MsaRuntimeError(
            TransportErrorCode.REMOTE_ERROR,
            ErrorScope.TRANSPORT,
            ErrorType.THIRD_PARTY,
            `${action} failed with HTTP ${status}: ${message}`,
            { action, status, path }
        );
    }

    static fetchUnavailable(): MsaRuntimeError {
        return new MsaRuntimeError(
            TransportErrorCode.FETCH_UNAVAILABLE,
            ErrorScope.TRANSPORT,
            ErrorType.SYSTEM,
            'No fetch implementation available. Use Node.js 18+ or pass one explicitly.'
        );
    }
}
