import { z } from 'zod';
import { resolveClientConfig } from '../config/loader.js';
import { resolveBaseUrl } from '../config/schemas.js';
import type { ClientConfig } from '../config/schemas.js';
import { ContextKeys, requireToken } from '../context/task-context.js';
import type { TaskContext } from '../context/task-context.js';
import type { JsonObject } from '../envelope/types.js';
import { createLogger, logToProcess } from '../logger/factory.js';
import { MsaLogComponent } from '../logger/types.js';
import type { Logger } from '../logger/types.js';
import { ensureTrace, renderTraceHeaders } from '../tracing/trace-context.js';
import { TransportError } from './errors.js';
import { MsaResponse } from './response.js';
import type {
    FetchFunction,
    FetchInit,
    GetOptions,
    HttpMethod,
    MsaHttpClientOptions,
    QueryParams,
    RequestOptions,
} from './types.js';

// Body of POST/PUT calls: a JSON object (mapping), nothing else
const PayloadSchema = z.record(z.unknown());

interface ReceivedResponse {
    status: number;
    statusText: string;
    ok: boolean;
    rawText: string;
}

function describeType(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    return typeof value;
}

function buildQueryString(query: QueryParams | undefined): string {
    if (!query) return '';
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
        for (const item of Array.isArray(value) ? value : [value]) {
            params.append(key, String(item));
        }
    }
    const search = params.toString();
    return search ? `?${search}` : '';
}

function resolveFetch(explicit?: FetchFunction): FetchFunction {
    if (explicit) {
        return explicit;
    }
    if (typeof globalThis.fetch === 'function') {
        return globalThis.fetch;
    }
    throw TransportError.fetchUnavailable();
}

/**
 * Authenticated client for the MSA REST API.
 *
 * Every call carries the task's bearer token and trace headers, is attempted once,
 * and returns its own {@link MsaResponse}. Non-2xx answers are not thrown: they come
 * back as responses holding a FAILED envelope. Network failures and timeouts throw.
 *
 * @example
 * ```typescript
 * const client = new MsaHttpClient({ context: TaskContext.fromEnv() });
 * const res = await client.get('/ordercommand/objects/42');
 * if (res.envelope) {
 *     return reportFailure(res.envelope.wo_comment, params);
 * }
 * ```
 */
export class MsaHttpClient {
    readonly baseUrl: string;
    readonly config: ClientConfig;
    readonly context: TaskContext;
    private readonly token: string;
    private readonly fetchFn: FetchFunction;
    private readonly logger: Logger;

    /**
     * @throws {MsaRuntimeError} with MISSING_TOKEN when the context has no TOKEN
     */
    constructor(options: MsaHttpClientOptions) {
        this.context = options.context;
        this.token = requireToken(options.context);
        this.config = resolveClientConfig(options.config);
        this.baseUrl = resolveBaseUrl(this.config);
        this.fetchFn = resolveFetch(options.fetch);
        this.logger = (
            options.logger ??
            createLogger({
                config: this.config.logger,
                taskId: this.context.getString(ContextKeys.PROCESS_ID),
            })
        ).createChild(MsaLogComponent.TRANSPORT);
    }

    /**
     * POST a JSON object; a missing body is sent as `{}`.
     * Times out after `postTimeoutMs` (60s by default) unless a timeout is given.
     */
    async post(
        path: string,
        body?: JsonObject,
        options: RequestOptions = {}
    ): Promise<MsaResponse> {
        const payload = this.encodePayload('POST', path, body ?? {});
        return this.request('POST', path, payload, {
            ...options,
            timeoutMs: options.timeoutMs ?? this.config.postTimeoutMs,
        });
    }

    async get(path: string, options: GetOptions = {}): Promise<MsaResponse> {
        return this.request('GET', path + buildQueryString(options.query), undefined, options);
    }

    async put(
        path: string,
        body?: JsonObject,
        options: RequestOptions = {}
    ): Promise<MsaResponse> {
        const payload = body === undefined ? undefined : this.encodePayload('PUT', path, body);
        return this.request('PUT', path, payload, options);
    }

    async delete(path: string, options: RequestOptions = {}): Promise<MsaResponse> {
        return this.request('DELETE', path, undefined, options);
    }

    /**
     * Log a message against an orchestrator process instance
     */
    logToProcess(processId: string, message: string): boolean {
        return logToProcess(processId, message, this.logger);
    }

    /**
     * Serialize a request body. Untyped callers can still pass arrays or strings,
     * which are rejected here before any network call.
     */
    private encodePayload(method: HttpMethod, path: string, body: unknown): string {
        const result = PayloadSchema.safeParse(body);
        if (!result.success) {
            throw TransportError.invalidPayload(method, path, describeType(body));
        }
        return JSON.stringify(result.data);
    }

    private buildHeaders(method: HttpMethod): Record<string, string> {
        const headers: Record<string, string> = {
            Accept: 'application/json',
        };
        if (method === 'POST' || method === 'PUT') {
            headers['Content-Type'] = 'application/json';
        }
        headers['Authorization'] = `Bearer ${this.token}`;

        const trace = ensureTrace(this.context, this.logger.createChild(MsaLogComponent.TRACING));
        return { ...headers, ...renderTraceHeaders(trace) };
    }

    private async request(
        method: HttpMethod,
        path: string,
        payload: string | undefined,
        options: RequestOptions
    ): Promise<MsaResponse> {
        const url = this.baseUrl + path;
        const action = options.action ?? `${method} ${path}`;
        const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
        if (timeoutMs !== undefined && !(Number.isFinite(timeoutMs) && timeoutMs > 0)) {
            throw TransportError.invalidTimeout(method, path, timeoutMs);
        }

        const requestInit: FetchInit = {
            method,
            headers: this.buildHeaders(method),
            ...(payload !== undefined && { body: payload }),
        };

        const controller = new AbortController();
        const timeoutId =
            timeoutMs !== undefined ? setTimeout(() => controller.abort(), timeoutMs) : undefined;
        requestInit.signal = controller.signal;

        this.logger.debug(`${method} ${url}`, { action });

        let received: ReceivedResponse;
        try {
            received = await this.send(url, requestInit);
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError' && timeoutMs !== undefined) {
                throw TransportError.timeout(method, path, timeoutMs);
            }
            throw TransportError.networkError(method, path, error);
        } finally {
            clearTimeout(timeoutId);
        }

        const result = new MsaResponse({ method, path, action, ...received });
        if (result.envelope) {
            this.logger.warn(`${action} failed: ${result.envelope.wo_comment}`, {
                status: result.status,
                path,
            });
        } else {
            this.logger.debug(`${action} succeeded`, { status: result.status });
        }
        return result;
    }

    private async send(url: string, init: FetchInit): Promise<ReceivedResponse> {
        const response = await this.fetchFn(url, init);
        return {
            status: response.status,
            statusText: response.statusText,
            ok: response.ok,
            rawText: await response.text(),
        };
    }
}
