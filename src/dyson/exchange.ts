// src/dyson/exchange.ts
// The protocol core is written once as generators: each operation yields the
// requests it needs and receives the responses. The two drivers below are the
// only place where a transport is called, so the blocking and the
// promise-based front ends run exactly the same steps.

import type { HttpRequest, HttpResponse, SyncTransport, Transport } from './transport.js';
import { toTransportError } from './transport.js';

export type Exchange<T> = Generator<HttpRequest, T, HttpResponse>;

/** Drive an exchange to completion, blocking on every request. */
export function runExchange<T>(exchange: Exchange<T>, transport: SyncTransport): T {
	let step = exchange.next();
	while (!step.done) {
		const request = step.value;
		let response: HttpResponse;
		try {
			response = transport.send(request);
		} catch (err) {
			// Surfaces inside the operation so its finally blocks run, then rethrows.
			step = exchange.throw(toTransportError(err, request));
			continue;
		}
		step = exchange.next(response);
	}
	return step.value;
}

/** Drive an exchange to completion, suspending at every request. */
export async function runExchangeAsync<T>(exchange: Exchange<T>, transport: Transport): Promise<T> {
	let step = exchange.next();
	while (!step.done) {
		const request = step.value;
		let response: HttpResponse;
		try {
			response = await transport.send(request);
		} catch (err) {
			step = exchange.throw(toTransportError(err, request));
			continue;
		}
		step = exchange.next(response);
	}
	return step.value;
}
