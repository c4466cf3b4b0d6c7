import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MsaHttpClient } from './http-client.js';
import { TransportErrorCode } from './error-codes.js';
import { MsaRuntimeError } from '../errors/index.js';
import { TaskContext } from '../context/task-context.js';
import { TaskContextErrorCode } from '../context/error-codes.js';
import { decodeEnvelope } from '../envelope/envelope.js';
import type { JsonObject } from '../envelope/types.js';
import { createMockLogger } from '../logger/test-utils.js';

const mockFetch = vi.fn();

function textResponse(status: number, body: string, statusText = '') {
    return {
        ok: status >= 200 && status < 300,
        status,
        statusText,
        text: () => Promise.resolve(body),
    };
}

function lastInit(): { method: string; headers: Record<string, string>; body?: string } {
    return mockFetch.mock.calls[mockFetch.mock.calls.length - 1]?.[1];
}

describe('MsaHttpClient', () => {
    let context: TaskContext;
    let client: MsaHttpClient;

    beforeEach(() => {
        vi.resetAllMocks();
        context = new TaskContext({ TOKEN: 'abc' });
        client = new MsaHttpClient({
            context,
            config: { host: 'localhost', port: 8480 },
            fetch: mockFetch,
            logger: createMockLogger(),
        });
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('Constructor', () => {
        it('builds the base URL from host and port', () => {
            expect(client.baseUrl).toBe('http://localhost:8480/ubi-api-rest');
        });

        it('fails when the task context has no token', () => {
            let thrown: unknown;
            try {
                new MsaHttpClient({ context: new TaskContext(), fetch: mockFetch });
            } catch (error) {
                thrown = error;
            }
            expect(thrown).toBeInstanceOf(MsaRuntimeError);
            expect(thrown).toMatchObject({
                code: TaskContextErrorCode.MISSING_TOKEN,
                recovery: 'Provide the token through MSA_TOKEN or the task context file',
            });
        });
    });

    describe('GET requests', () => {
        it('returns the raw body of a successful call unwrapped', async () => {
            mockFetch.mockResolvedValueOnce(textResponse(200, '["svc1","svc2"]'));

            const res = await client.get('/ordercommand/objects/42');

            expect(mockFetch).toHaveBeenCalledWith(
                'http://localhost:8480/ubi-api-rest/ordercommand/objects/42',
                expect.objectContaining({ method: 'GET', signal: expect.any(AbortSignal) })
            );
            expect(res.ok).toBe(true);
            expect(res.content).toBe('["svc1","svc2"]');
            expect(res.envelope).toBeUndefined();
            expect(res.json()).toEqual(['svc1', 'svc2']);
        });

        it('sends auth, accept and trace headers without a content type', async () => {
            mockFetch.mockResolvedValueOnce(textResponse(200, '{}'));

            await client.get('/ordercommand/objects/42');

            const headers = lastInit().headers;
            expect(headers).toMatchObject({
                Accept: 'application/json',
                Authorization: 'Bearer abc',
            });
            expect(headers['Content-Type']).toBeUndefined();
            expect(headers.traceparent).toMatch(/^00-[0-9a-f]{32}-[0-9a-f]{16}-01$/);
            expect(headers['X-B3-TraceId']).toBe(context.get('TRACEID'));
            expect(headers['X-B3-SpanId']).toBe(context.get('SPANID'));
        });

        it('appends query parameters', async () => {
            mockFetch.mockResolvedValueOnce(textResponse(200, '[]'));

            await client.get('/device/v2', { query: { page: 1, filter: ['a', 'b b'] } });

            expect(mockFetch.mock.calls[0]?.[0]).toBe(
                'http://localhost:8480/ubi-api-rest/device/v2?page=1&filter=a&filter=b+b'
            );
        });

        it('reads an empty successful body as {}', async () => {
            mockFetch.mockResolvedValueOnce(textResponse(204, ''));

            const res = await client.get('/ordercommand/objects/42');

            expect(res.rawText).toBe('');
            expect(res.content).toBe('{}');
        });

        it('has no client-side timeout unless configured', async () => {
            const timeoutSpy = vi.spyOn(globalThis, 'setTimeout');
            mockFetch.mockResolvedValueOnce(textResponse(200, '{}'));

            await client.get('/ordercommand/objects/42');

            expect(timeoutSpy).not.toHaveBeenCalled();
        });
    });

    describe('POST requests', () => {
        it('serializes the body and sends a JSON content type', async () => {
            mockFetch.mockResolvedValueOnce(textResponse(200, '{"status":"OK"}'));

            await client.post('/ordercommand/execute/12/CREATE', {
                simple_firewall: { '12': { object_id: '12', dst_port: '44' } },
            });

            const init = lastInit();
            expect(init.method).toBe('POST');
            expect(init.headers['Content-Type']).toBe('application/json');
            expect(init.body).toBe(
                '{"simple_firewall":{"12":{"object_id":"12","dst_port":"44"}}}'
            );
        });

        it('sends {} when no body is given', async () => {
            mockFetch.mockResolvedValueOnce(textResponse(200, ''));

            await client.post('/ordercommand/synchronize/12');

            expect(lastInit().body).toBe('{}');
        });

        it('defaults to a 60 second timeout', async () => {
            const timeoutSpy = vi.spyOn(globalThis, 'setTimeout');
            mockFetch.mockResolvedValueOnce(textResponse(200, '{}'));

            await client.post('/ordercommand/synchronize/12');

            expect(timeoutSpy).toHaveBeenCalledWith(expect.any(Function), 60000);
        });

        it('uses the timeout passed by the caller', async () => {
            const timeoutSpy = vi.spyOn(globalThis, 'setTimeout');
            mockFetch.mockResolvedValueOnce(textResponse(200, '{}'));

            await client.post('/ordercommand/execute/12/CREATE', {}, { timeoutMs: 300000 });

            expect(timeoutSpy).toHaveBeenCalledWith(expect.any(Function), 300000);
        });

        it('rejects a timeout that is not positive without calling the API', async () => {
            await expect(
                client.post('/ordercommand/synchronize/12', {}, { timeoutMs: 0 })
            ).rejects.toMatchObject({
                code: TransportErrorCode.INVALID_TIMEOUT,
                context: { method: 'POST', path: '/ordercommand/synchronize/12', timeoutMs: 0 },
            });
            await expect(client.get('/x', { timeoutMs: -5 })).rejects.toMatchObject({
                code: TransportErrorCode.INVALID_TIMEOUT,
            });
            expect(mockFetch).not.toHaveBeenCalled();
        });

        it('rejects a non-object body without calling the API', async () => {
            const notAnObject = ['a', 'b'] as unknown as JsonObject;

            await expect(client.post('/ordercommand/execute/12/CREATE', notAnObject)).rejects
                .toMatchObject({
                    code: TransportErrorCode.INVALID_PAYLOAD,
                    context: { method: 'POST', receivedType: 'array' },
                });
            expect(mockFetch).toHaveBeenCalledTimes(0);
        });
    });

    describe('PUT and DELETE requests', () => {
        it('PUT sends a JSON body', async () => {
            mockFetch.mockResolvedValueOnce(textResponse(200, '{}'));

            await client.put('/device/12', { name: 'fw-1' });

            expect(lastInit()).toMatchObject({
                method: 'PUT',
                body: '{"name":"fw-1"}',
                headers: { 'Content-Type': 'application/json', Authorization: 'Bearer abc' },
            });
        });

        it('PUT without a body sends none', async () => {
            mockFetch.mockResolvedValueOnce(textResponse(200, '{}'));

            await client.put('/device/12/activate');

            expect(lastInit().body).toBeUndefined();
        });

        it('PUT rejects a string body', async () => {
            const notAnObject = 'name=fw-1' as unknown as JsonObject;

            await expect(client.put('/device/12', notAnObject)).rejects.toMatchObject({
                code: TransportErrorCode.INVALID_PAYLOAD,
            });
            expect(mockFetch).not.toHaveBeenCalled();
        });

        it('DELETE sends no body and no content type', async () => {
            mockFetch.mockResolvedValueOnce(textResponse(200, ''));

            await client.delete('/device/12');

            const init = lastInit();
            expect(init.method).toBe('DELETE');
            expect(init.body).toBeUndefined();
            expect(init.headers['Content-Type']).toBeUndefined();
        });
    });

    describe('Response classification', () => {
        it('normalizes a failed call into a FAILED envelope', async () => {
            mockFetch.mockResolvedValueOnce(textResponse(400, '{"message":"bad input"}'));

            const res = await client.post('/ordercommand/execute/12/CREATE', {}, {
                action: 'Command execute',
            });

            expect(res.ok).toBe(false);
            expect(res.status).toBe(400);
            const decoded = decodeEnvelope(res.content);
            expect(decoded.ok).toBe(true);
            if (decoded.ok) {
                expect(decoded.data.wo_status).toBe('FAILED');
                expect(decoded.data.wo_comment).toContain('bad input');
                expect(decoded.data.wo_newparams).toEqual({ action: 'Command execute' });
            }
        });

        it('names the call by method and path when no action is given', async () => {
            mockFetch.mockResolvedValueOnce(textResponse(404, '{"message":"no device"}'));

            const res = await client.delete('/device/99');

            expect(res.envelope).toEqual({
                wo_status: 'FAILED',
                wo_comment: 'no device',
                wo_newparams: { action: 'DELETE /device/99' },
            });
        });

        it('falls back to the status line when the error body has no message', async () => {
            mockFetch.mockResolvedValueOnce(textResponse(502, '<html>proxy</html>', 'Bad Gateway'));

            const res = await client.get('/ordercommand/objects/42');

            expect(res.envelope?.wo_comment).toBe('HTTP 502: Bad Gateway');
        });

        it('converts a failed call into an error on demand', async () => {
            mockFetch.mockResolvedValueOnce(textResponse(500, '{"message":"db down"}'));

            const res = await client.get('/ordercommand/objects/42', { action: 'Get Microservices' });
            const error = res.toError();

            expect(error).toBeInstanceOf(MsaRuntimeError);
            expect(error).toMatchObject({
                code: TransportErrorCode.REMOTE_ERROR,
                message: 'Get Microservices failed with HTTP 500: db down',
            });
        });

        it('has no error for a successful call', async () => {
            mockFetch.mockResolvedValueOnce(textResponse(200, '{}'));

            const res = await client.get('/ordercommand/objects/42');

            expect(res.toError()).toBeUndefined();
        });

        it('logs failed calls as warnings', async () => {
            const logger = createMockLogger();
            const logged = new MsaHttpClient({ context, fetch: mockFetch, logger });
            mockFetch.mockResolvedValueOnce(textResponse(400, '{"message":"bad input"}'));

            await logged.get('/x', { action: 'Read x' });

            expect(logger.warn).toHaveBeenCalledWith('Read x failed: bad input', {
                status: 400,
                path: '/x',
            });
        });

        it('keeps each call result independent', async () => {
            mockFetch
                .mockResolvedValueOnce(textResponse(200, '["first"]'))
                .mockResolvedValueOnce(textResponse(500, '{"message":"second failed"}'));

            const [first, second] = await Promise.all([client.get('/a'), client.get('/b')]);

            expect(first?.content).toBe('["first"]');
            expect(second?.envelope?.wo_comment).toBe('second failed');
        });
    });

    describe('Tracing', () => {
        it('reuses one trace id for every call of the task', async () => {
            mockFetch.mockResolvedValue(textResponse(200, '{}'));

            await client.get('/a');
            const firstTraceparent = lastInit().headers.traceparent;
            await client.post('/b');
            await client.delete('/c');

            for (const call of mockFetch.mock.calls) {
                expect(call[1].headers.traceparent).toBe(firstTraceparent);
            }
        });

        it('propagates trace ids already present in the task context', async () => {
            context.set('TRACEID', '0af7651916cd43dd8448eb211c80319c');
            context.set('SPANID', 'b7ad6b7169203331');
            mockFetch.mockResolvedValueOnce(textResponse(200, '{}'));

            await client.get('/a');

            expect(lastInit().headers.traceparent).toBe(
                '00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01'
            );
        });
    });

    describe('Transport failures', () => {
        it('throws a network error once, without retrying', async () => {
            mockFetch.mockRejectedValue(new TypeError('fetch failed'));

            await expect(client.get('/ordercommand/objects/42')).rejects.toMatchObject({
                code: TransportErrorCode.NETWORK_ERROR,
                message: 'Network error calling GET /ordercommand/objects/42: fetch failed',
            });
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('throws a timeout error when the call is aborted', async () => {
            const abortError = new Error('This operation was aborted');
            abortError.name = 'AbortError';
            mockFetch.mockRejectedValueOnce(abortError);

            await expect(
                client.post('/ordercommand/synchronize/12', {}, { timeoutMs: 5 })
            ).rejects.toMatchObject({
                code: TransportErrorCode.TIMEOUT,
                context: { method: 'POST', path: '/ordercommand/synchronize/12', timeoutMs: 5 },
            });
        });

        it('aborts a call that outlives its timeout', async () => {
            mockFetch.mockImplementationOnce(
                (_url: string, init: { signal: AbortSignal }) =>
                    new Promise((_resolve, reject) => {
                        init.signal.addEventListener('abort', () => {
                            const error = new Error('aborted');
                            error.name = 'AbortError';
                            reject(error);
                        });
                    })
            );

            await expect(client.get('/slow', { timeoutMs: 10 })).rejects.toMatchObject({
                code: TransportErrorCode.TIMEOUT,
            });
        });
    });

    describe('logToProcess', () => {
        it('logs against the process id', () => {
            const logger = createMockLogger();
            const logged = new MsaHttpClient({ context, fetch: mockFetch, logger });

            expect(logged.logToProcess('981', 'configuration pushed')).toBe(true);
            expect(logger.info).toHaveBeenCalledWith('configuration pushed', { processId: '981' });
        });
    });
});
