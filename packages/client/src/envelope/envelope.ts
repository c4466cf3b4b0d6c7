import { ContextKeys } from '../context/task-context.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { getDefaultLogger } from '../logger/factory.js';
import { MsaLogComponent } from '../logger/types.js';
import type { Logger } from '../logger/types.js';
import { fail, ok, zodToIssues } from '../utils/result.js';
import type { Result } from '../utils/result.js';
import { ResponseEnvelopeSchema } from './schemas.js';
import type { JsonObject, ResponseEnvelope, WoStatus } from './types.js';

export interface EncodeOptions {
    /** Log the params (without TOKEN) at info level */
    log?: boolean;
    logger?: Logger | undefined;
}

export function buildEnvelope(
    status: WoStatus,
    comment: string,
    newParams: JsonObject = {}
): ResponseEnvelope {
    return {
        wo_status: status,
        wo_comment: comment,
        wo_newparams: newParams,
    };
}

/**
 * Params as they may appear in logs: a copy without the task's bearer token
 */
export function sanitizeParams(newParams: JsonObject): JsonObject {
    const sanitized: JsonObject = { ...newParams };
    delete sanitized[ContextKeys.TOKEN];
    return sanitized;
}

/**
 * Serialize an envelope.
 *
 * With `log`, the params are pretty-printed without TOKEN. The returned text is built
 * from the params as given and still contains anything the caller put in them.
 */
export function encodeEnvelope(
    status: WoStatus,
    comment: string,
    newParams: JsonObject = {},
    options: EncodeOptions = {}
): string {
    if (options.log) {
        const logger = options.logger ?? getDefaultLogger().createChild(MsaLogComponent.ENVELOPE);
        logger.info(JSON.stringify(sanitizeParams(newParams), null, 4));
    }
    return JSON.stringify(buildEnvelope(status, comment, newParams));
}

/**
 * Parse envelope text, e.g. the content of a failed call
 */
export function decodeEnvelope(text: string): Result<ResponseEnvelope> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        return fail([
            {
                code: 'envelope_invalid_json',
                message: error instanceof Error ? error.message : String(error),
                scope: ErrorScope.ENVELOPE,
                type: ErrorType.USER,
                severity: 'error',
            },
        ]);
    }

    const result = ResponseEnvelopeSchema.safeParse(parsed);
    if (!result.success) {
        return fail(zodToIssues(result.error, 'error', ErrorScope.ENVELOPE));
    }
    return ok(result.data);
}
