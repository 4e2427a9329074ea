import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ErrorType } from '@baton/core';
import { createSilentMockLogger } from '@baton/core/test-utils';
import { ProtocolErrorCode } from './error-codes.js';
import { CommunicationError, ProtocolError } from './errors.js';
import { HttpJsonRpcTransport } from './transport.js';
import type { JsonRpcRequest } from './jsonrpc/types.js';

const request: JsonRpcRequest = {
    jsonrpc: '2.0',
    id: 'req-1',
    method: 'tasks/get',
    params: { id: 'task-1' },
};

describe('HttpJsonRpcTransport', () => {
    const fetchMock = vi.fn<typeof fetch>();

    beforeEach(() => {
        fetchMock.mockReset();
    });

    function createTransport(overrides: { authToken?: string; timeoutMs?: number } = {}) {
        return new HttpJsonRpcTransport({
            url: 'http://agent.test/rpc/',
            timeoutMs: overrides.timeoutMs ?? 1000,
            logger: createSilentMockLogger(),
            fetch: fetchMock,
            ...(overrides.authToken !== undefined && { authToken: overrides.authToken }),
        });
    }

    it('should POST the request with a bearer token and return the body', async () => {
        const body = { jsonrpc: '2.0', id: 'req-1', result: { ok: true } };
        fetchMock.mockResolvedValueOnce(new Response(JSON.stringify(body), { status: 200 }));

        const result = await createTransport({ authToken: 'test-secret' }).send(request);

        expect(result).toEqual(body);
        expect(fetchMock).toHaveBeenCalledWith(
            'http://agent.test/rpc',
            expect.objectContaining({
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    Accept: 'application/json',
                    Authorization: 'Bearer test-secret',
                },
                body: JSON.stringify(request),
                signal: expect.any(AbortSignal),
            })
        );
    });

    it('should omit the Authorization header without a token', async () => {
        fetchMock.mockResolvedValueOnce(new Response('{}', { status: 200 }));

        await createTransport().send(request);

        expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
            'Content-Type': 'application/json',
            Accept: 'application/json',
        });
    });

    it('should map HTTP errors to CommunicationError', async () => {
        fetchMock.mockResolvedValueOnce(
            new Response('denied', { status: 401, statusText: 'Unauthorized' })
        );

        const error = await createTransport().send(request).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(CommunicationError);
        expect(error).toMatchObject({
            code: ProtocolErrorCode.HTTP_ERROR,
            type: ErrorType.FORBIDDEN,
            message: 'HTTP 401: Unauthorized (http://agent.test/rpc)',
        });
    });

    it('should map network failures to CommunicationError', async () => {
        fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

        await expect(createTransport().send(request)).rejects.toMatchObject({
            code: ProtocolErrorCode.REQUEST_FAILED,
            message: 'Request to http://agent.test/rpc failed: fetch failed',
        });
    });

    it('should abort requests that exceed the timeout', async () => {
        fetchMock.mockImplementationOnce(
            (_input, init) =>
                new Promise<Response>((_resolve, reject) => {
                    init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
                })
        );

        await expect(createTransport({ timeoutMs: 10 }).send(request)).rejects.toMatchObject({
            code: ProtocolErrorCode.REQUEST_TIMEOUT,
            type: ErrorType.TIMEOUT,
        });
    });

    it('should time out a response whose body never finishes', async () => {
        fetchMock.mockResolvedValueOnce(
            new Response(new ReadableStream<Uint8Array>({ start() {} }), { status: 200 })
        );

        await expect(createTransport({ timeoutMs: 20 }).send(request)).rejects.toMatchObject({
            code: ProtocolErrorCode.REQUEST_TIMEOUT,
            type: ErrorType.TIMEOUT,
            message: 'Request to http://agent.test/rpc timed out after 20ms',
        });
    });

    it('should raise ProtocolError for a body that is not JSON', async () => {
        fetchMock.mockResolvedValueOnce(new Response('not json', { status: 200 }));

        const error = await createTransport().send(request).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ProtocolError);
        expect(error).toMatchObject({ code: ProtocolErrorCode.INVALID_JSON });
    });
});
