import type { Logger } from '@baton/core';
import { errorMessage } from '@baton/core';
import { untilAborted } from './abort.js';
import { ProtocolErrors } from './errors.js';
import type { JsonRpcRequest } from './jsonrpc/types.js';

/**
 * Moves one JSON-RPC request to an agent and returns the raw response body.
 * Envelope and result validation belong to the caller.
 */
export interface JsonRpcTransport {
    readonly endpoint: string;
    send(request: JsonRpcRequest): Promise<unknown>;
}

export interface HttpJsonRpcTransportOptions {
    url: string;
    authToken?: string;
    timeoutMs: number;
    logger: Logger;
    /** Defaults to the global fetch */
    fetch?: typeof fetch;
}

/**
 * JSON-RPC over HTTP POST with bearer auth and a per-request timeout
 */
export class HttpJsonRpcTransport implements JsonRpcTransport {
    readonly endpoint: string;
    private readonly authToken: string | undefined;
    private readonly timeoutMs: number;
    private readonly logger: Logger;
    private readonly fetchImpl: typeof fetch;

    constructor(options: HttpJsonRpcTransportOptions) {
        this.endpoint = options.url.replace(/\/$/, '');
        this.authToken = options.authToken;
        this.timeoutMs = options.timeoutMs;
        this.logger = options.logger;
        this.fetchImpl = options.fetch ?? fetch;
    }

    async send(request: JsonRpcRequest): Promise<unknown> {
        const headers: Record<string, string> = {
            'Content-Type': 'application/json',
            Accept: 'application/json',
        };
        if (this.authToken) {
            headers.Authorization = `Bearer ${this.authToken}`;
        }

        this.logger.debug(`POST ${this.endpoint} ${request.method}`, { id: request.id });

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
        // The deadline covers the body as well as the headers
        try {
            const response = await this.post(request, headers, controller.signal);
            if (!response.ok) {
                throw ProtocolErrors.httpError(
                    this.endpoint,
                    request.method,
                    response.status,
                    response.statusText
                );
            }
            return await this.readJson(response, request.method, controller.signal);
        } finally {
            clearTimeout(timeoutId);
        }
    }

    private async post(
        request: JsonRpcRequest,
        headers: Record<string, string>,
        signal: AbortSignal
    ): Promise<Response> {
        try {
            return await this.fetchImpl(this.endpoint, {
                method: 'POST',
                headers,
                body: JSON.stringify(request),
                signal,
            });
        } catch (error) {
            if (signal.aborted) {
                throw ProtocolErrors.requestTimeout(this.endpoint, request.method, this.timeoutMs);
            }
            throw ProtocolErrors.requestFailed(this.endpoint, request.method, errorMessage(error));
        }
    }

    private async readJson(
        response: Response,
        method: string,
        signal: AbortSignal
    ): Promise<unknown> {
        let text: string;
        try {
            text = await untilAborted(response.text(), signal);
        } catch (error) {
            if (signal.aborted) {
                throw ProtocolErrors.requestTimeout(this.endpoint, method, this.timeoutMs);
            }
            throw ProtocolErrors.requestFailed(this.endpoint, method, errorMessage(error));
        }

        try {
            const body: unknown = JSON.parse(text);
            return body;
        } catch (error) {
            throw ProtocolErrors.invalidJson(method, errorMessage(error));
        }
    }
}
