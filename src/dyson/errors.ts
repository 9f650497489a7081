// src/dyson/errors.ts
// Error taxonomy for the Dyson cloud core. Nothing here is retried; callers
// branch on `code` (or instanceof) to decide between re-prompting and giving up.

export type DysonErrorCode =
	| 'INVALID_IDENTIFIER'
	| 'AUTH_REJECTED'
	| 'AUTH_UNAUTHORIZED'
	| 'PROTOCOL_ERROR'
	| 'TRANSPORT_ERROR'
	| 'DECRYPTION_ERROR'
	| 'INVALID_STATE'
	| 'CONFIG_ERROR';

export type DecryptionStage = 'base64' | 'cipher' | 'json-extract' | 'field-missing';

export abstract class DysonError extends Error {
	public abstract readonly code: DysonErrorCode;

	protected constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Local pre-flight failure: no request was sent. */
export class InvalidIdentifierError extends DysonError {
	public readonly code = 'INVALID_IDENTIFIER';

	constructor(message: string, public readonly identifier: string) {
		super(message);
	}
}

/** Backend refused malformed auth parameters (HTTP 400 family). */
export class AuthRejectedError extends DysonError {
	public readonly code = 'AUTH_REJECTED';

	constructor(message: string, public readonly status: number) {
		super(message);
	}
}

/**
 * Backend refused the identifier, OTP or bearer token (HTTP 401/403), or an
 * authenticated call was attempted without any credential at all.
 */
export class AuthUnauthorizedError extends DysonError {
	public readonly code = 'AUTH_UNAUTHORIZED';

	constructor(message: string, public readonly status?: number) {
		super(message);
	}
}

/** Well-formed exchange, unexpected status or payload. */
export class ProtocolError extends DysonError {
	public readonly code = 'PROTOCOL_ERROR';
	public readonly status?: number;
	public readonly field?: string;
	public readonly details?: unknown;

	constructor(
		message: string,
		info: { status?: number; field?: string; details?: unknown } = {},
	) {
		super(message);
		this.status = info.status;
		this.field = info.field;
		this.details = info.details;
	}
}

export class TransportError extends DysonError {
	public readonly code = 'TRANSPORT_ERROR';

	constructor(message: string, cause?: unknown) {
		super(message, { cause });
	}
}

export class DecryptionError extends DysonError {
	public readonly code = 'DECRYPTION_ERROR';

	/**
	 * Full decrypted text, when decryption got that far. Non-enumerable so it
	 * never shows up when the error is printed or serialised.
	 */
	public declare readonly plaintext?: string;

	constructor(
		message: string,
		public readonly stage: DecryptionStage,
		options: { cause?: unknown; plaintext?: string } = {},
	) {
		super(message, { cause: options.cause });
		if (options.plaintext !== undefined) {
			Object.defineProperty(this, 'plaintext', {
				value: options.plaintext,
				enumerable: false,
			});
		}
	}
}

/** A local precondition of the login flow does not hold (e.g. no challenge). */
export class InvalidStateError extends DysonError {
	public readonly code = 'INVALID_STATE';

	constructor(message: string) {
		super(message);
	}
}

export class ConfigError extends DysonError {
	public readonly code = 'CONFIG_ERROR';

	constructor(message: string, public readonly field?: string) {
		super(message);
	}
}

export function isDysonError(err: unknown): err is DysonError {
	return err instanceof DysonError;
}

/**
 * Pull a human readable message out of an error payload.
 * Observed shapes: { error: { msg } }, { message }, { error: '...' }, plain text.
 */
export function errorMessageFromBody(body: unknown): string | undefined {
	if (typeof body === 'string') {
		const trimmed = body.trim();
		return trimmed.length > 0 ? trimmed.slice(0, 200) : undefined;
	}
	if (!body || typeof body !== 'object') {
		return undefined;
	}

	if ('message' in body && typeof body.message === 'string') {
		return body.message;
	}
	if ('error' in body) {
		const error = body.error;
		if (typeof error === 'string') {
			return error;
		}
		if (error && typeof error === 'object' && 'msg' in error && typeof error.msg === 'string') {
			return error.msg;
		}
	}
	return undefined;
}

export type StatusContext = 'auth' | 'api';

/**
 * Map a non-2xx status to the taxonomy.
 *
 * On the login endpoints a 400 means the backend rejected the parameters; on
 * every other endpoint it is just an unexpected response.
 */
export function statusToError(
	status: number,
	what: string,
	context: StatusContext,
	body?: unknown,
): DysonError {
	const detail = errorMessageFromBody(body);
	const suffix = detail ? `: ${detail}` : '';

	if (status === 401 || status === 403) {
		return new AuthUnauthorizedError(
			context === 'auth'
				? `${what} unauthorized (HTTP ${status}); check the identifier or OTP code${suffix}`
				: `${what} unauthorized (HTTP ${status}); bearer token expired or invalid${suffix}`,
			status,
		);
	}

	if (context === 'auth' && status >= 400 && status < 500 && status !== 404 && status !== 429) {
		return new AuthRejectedError(`${what} rejected by the Dyson API (HTTP ${status})${suffix}`, status);
	}

	return new ProtocolError(`${what} failed with HTTP ${status}${suffix}`, {
		status,
		details: body,
	});
}
