import type { ClientConfigInput } from '../config/schemas.js';
import type { TaskContext } from '../context/task-context.js';
import type { Logger } from '../logger/types.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

// Derive fetch types from the global fetch instead of DOM lib globals
export type FetchInput = Parameters<typeof fetch>[0];
export type FetchInit = NonNullable<Parameters<typeof fetch>[1]>;
export type FetchResponse = Awaited<ReturnType<typeof fetch>>;

export interface FetchFunction {
    (input: FetchInput, init?: FetchInit): Promise<FetchResponse>;
}

export type QueryValue = string | number | boolean;
export type QueryParams = Record<string, QueryValue | QueryValue[]>;

export interface RequestOptions {
    /** Abort the call after this many milliseconds */
    timeoutMs?: number | undefined;
    /** Name of the operation, used in failure envelopes and logs */
    action?: string | undefined;
}

export interface GetOptions extends RequestOptions {
    query?: QueryParams | undefined;
}

export interface MsaHttpClientOptions {
    /** Task context supplying TOKEN and holding the trace ids */
    context: TaskContext;
    config?: ClientConfigInput | undefined;
    /** Defaults to the global fetch */
    fetch?: FetchFunction | undefined;
    logger?: Logger | undefined;
}
