// src/dyson/transport.ts
// Boundary with the network layer. The protocol core only ever produces
// HttpRequest values and consumes HttpResponse values; TLS, pooling and
// timeouts belong to whichever Transport the caller plugs in.

import { isDysonError, TransportError } from './errors.js';

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequest {
	method: HttpMethod;
	/** Base URL, e.g. https://appapi.cp.dyson.com */
	host: string;
	path: string;
	query?: Record<string, string>;
	headers: Record<string, string>;
	/** JSON-serialisable body. */
	body?: unknown;
}

export type ResponseBody =
	| { kind: 'json'; value: unknown }
	| { kind: 'text'; value: string };

export interface HttpResponse {
	status: number;
	body: ResponseBody;
}

/** Cooperative (promise based) transport used by DysonClient. */
export interface Transport {
	send(request: HttpRequest): Promise<HttpResponse>;
}

/** Blocking transport used by DysonSyncClient. */
export interface SyncTransport {
	send(request: HttpRequest): HttpResponse;
}

export function buildUrl(request: Pick<HttpRequest, 'host' | 'path' | 'query'>): string {
	const url = new URL(request.path, request.host);
	for (const [key, value] of Object.entries(request.query ?? {})) {
		url.searchParams.set(key, value);
	}
	return url.toString();
}

/**
 * Classify a raw response body. Anything that parses as JSON is JSON,
 * regardless of the content type the backend claims.
 */
export function parseResponseBody(text: string): ResponseBody {
	if (text.trim().length === 0) {
		return { kind: 'text', value: text };
	}
	try {
		return { kind: 'json', value: JSON.parse(text) };
	} catch {
		return { kind: 'text', value: text };
	}
}

export function toTransportError(err: unknown, request?: Pick<HttpRequest, 'method' | 'path'>): Error {
	if (isDysonError(err)) {
		return err;
	}
	const where = request ? ` (${request.method} ${request.path})` : '';
	const reason = err instanceof Error ? err.message : String(err);
	return new TransportError(`Dyson API request failed${where}: ${reason}`, err);
}

export interface FetchTransportOptions {
	/** Per-request timeout; unset means no timeout. */
	timeoutMs?: number;
	/** Injectable for tests; defaults to the global fetch of Node 20. */
	fetch?: typeof fetch;
}

export class FetchTransport implements Transport {
	private readonly timeoutMs?: number;
	private readonly fetchImpl: typeof fetch;

	constructor(options: FetchTransportOptions = {}) {
		this.timeoutMs = options.timeoutMs;
		this.fetchImpl = options.fetch ?? fetch;
	}

	public async send(request: HttpRequest): Promise<HttpResponse> {
		try {
			const res = await this.fetchImpl(buildUrl(request), {
				method: request.method,
				headers: { ...request.headers },
				body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
				signal: this.timeoutMs !== undefined ? AbortSignal.timeout(this.timeoutMs) : undefined,
			});
			const text = await res.text();
			return { status: res.status, body: parseResponseBody(text) };
		} catch (err) {
			throw toTransportError(err, request);
		}
	}
}
