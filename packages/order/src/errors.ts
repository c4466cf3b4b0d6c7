import { ErrorScope, ErrorType, MsaRuntimeError } from '@msa-sdk/client';
import type { ResponseEnvelope } from '@msa-sdk/client';
import { OrderErrorCode } from './error-codes.js';

/**
 * Order command error factory
 */
export class OrderError {
    /**
     * The API answered a read with an error; carries the FAILED envelope
     */
    static requestFailed(action: string, envelope: ResponseEnvelope): MsaRuntimeError {
        return new MsaRuntimeError(
            OrderErrorCode.REQUEST_FAILED,
            ErrorScope.ORDER,
            ErrorType.THIRD_PARTY,
            `${action} failed: ${envelope.wo_comment}`,
            { action, envelope }
        );
    }

    static invalidResponse(action: string, reason: string): MsaRuntimeError {
        return new MsaRuntimeError(
            OrderErrorCode.INVALID_RESPONSE,
            ErrorScope.ORDER,
            ErrorType.THIRD_PARTY,
            `${action} returned an unexpected body: ${reason}`,
            { action, reason }
        );
    }
}
