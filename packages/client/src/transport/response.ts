import type { z } from 'zod';
import { buildEnvelope } from '../envelope/envelope.js';
import { WoStatus } from '../envelope/types.js';
import type { ResponseEnvelope } from '../envelope/types.js';
import type { MsaRuntimeError } from '../errors/MsaRuntimeError.js';
import { TransportError } from './errors.js';
import type { HttpMethod } from './types.js';

const EMPTY_CONTENT = '{}';

export interface ResponseInit {
    method: HttpMethod;
    path: string;
    action: string;
    status: number;
    statusText: string;
    ok: boolean;
    rawText: string;
}

/**
 * `message` of an error body, or a status line when the body has none
 */
export function extractErrorMessage(rawText: string, status: number, statusText: string): string {
    try {
        const body: unknown = JSON.parse(rawText);
        if (typeof body === 'object' && body !== null && 'message' in body) {
            const { message } = body;
            if (typeof message === 'string') {
                return message;
            }
        }
    } catch {
        // Not JSON: fall through to the status line
    }
    return statusText ? `HTTP ${status}: ${statusText}` : `HTTP ${status}`;
}

/**
 * Outcome of one call against the MSA API.
 *
 * Successful calls keep the raw body as their content. Failed calls (non-2xx) carry a
 * FAILED envelope instead, and their content is that envelope's JSON text.
 */
export class MsaResponse {
    readonly method: HttpMethod;
    readonly path: string;
    readonly action: string;
    readonly status: number;
    readonly statusText: string;
    readonly ok: boolean;
    readonly rawText: string;
    /** Present only when the call failed */
    readonly envelope: ResponseEnvelope | undefined;

    private parsed: { value: unknown } | undefined;

    constructor(init: ResponseInit) {
        this.method = init.method;
        this.path = init.path;
        this.action = init.action;
        this.status = init.status;
        this.statusText = init.statusText;
        this.ok = init.ok;
        this.rawText = init.rawText;
        this.envelope = init.ok
            ? undefined
            : buildEnvelope(
                  WoStatus.FAILED,
                  extractErrorMessage(init.rawText, init.status, init.statusText),
                  { action: init.action }
              );
    }

    /**
     * Raw body on success ('{}' when empty), FAILED envelope JSON on failure
     */
    get content(): string {
        if (this.envelope) {
            return JSON.stringify(this.envelope);
        }
        return this.rawText === '' ? EMPTY_CONTENT : this.rawText;
    }

    /**
     * Content parsed as JSON, computed on first access
     * @throws {SyntaxError} when the content is not JSON
     */
    json(): unknown {
        if (!this.parsed) {
            this.parsed = { value: JSON.parse(this.content) };
        }
        return this.parsed.value;
    }

    /**
     * Content parsed as JSON and validated against a schema
     */
    parse<S extends z.ZodTypeAny>(schema: S): z.output<S> {
        return schema.parse(this.json());
    }

    /**
     * Error equivalent of a failed call, for callers that prefer to throw
     */
    toError(): MsaRuntimeError | undefined {
        if (!this.envelope) {
            return undefined;
        }
        return TransportError.remoteError(
            this.action,
            this.status,
            this.envelope.wo_comment,
            this.path
        );
    }
}
