import type { ErrorScope, ErrorType, MsaErrorCode } from './types.js';

/**
 * Runtime error raised by the SDK.
 * Carries a typed code, the scope that raised it and structured context for logging.
 */
export class MsaRuntimeError<C = Record<string, unknown>> extends Error {
    readonly code: MsaErrorCode | string;
    readonly scope: ErrorScope | string;
    readonly type: ErrorType;
    readonly context: C | undefined;
    readonly recovery: string | undefined;

    constructor(
        code: MsaErrorCode | string,
        scope: ErrorScope | string,
        type: ErrorType,
        message: string,
        context?: C,
        recovery?: string
    ) {
        super(message);
        this.name = 'MsaRuntimeError';
        this.code = code;
        this.scope = scope;
        this.type = type;
        this.context = context;
        this.recovery = recovery;
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            scope: this.scope,
            type: this.type,
            message: this.message,
            ...(this.context !== undefined && { context: this.context }),
            ...(this.recovery !== undefined && { recovery: this.recovery }),
        };
    }
}
