// src/dyson/local-credentials.ts
// Decryption of a device's local MQTT broker password.
//
// The manifest ships the password as base64(AES-256-CBC(json)) under a key and
// IV shared by the whole device family. The plaintext is a JSON document such
// as {"apPasswordHash": "..."}, padded with PKCS#7 or NUL bytes, and on some
// robot firmware followed by extra JSON or stray bytes.

import { createDecipheriv } from 'node:crypto';

import type { LocalCredentialsConfig } from './config.js';
import { DecryptionError, type DecryptionStage } from './errors.js';
import { extractFirstJsonValue, JsonExtractError } from './json-extract.js';
import { consoleLogger, type DysonLogger } from './logger.js';

export interface LocalCredentials {
	/** The device serial number; it is not part of the ciphertext. */
	readonly username: string;
	readonly password: string;
}

const defaultLogger: DysonLogger = consoleLogger('[dyson-local-credentials]');

// Standard alphabet, canonical padding.
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const AES_BLOCK_SIZE = 16;

/** Strict base64 decode; null when the text is not canonical base64. */
export function decodeBase64Strict(text: string): Buffer | null {
	const compact = text.replace(/\s+/g, '');
	if (compact.length === 0 || !BASE64_PATTERN.test(compact)) {
		return null;
	}
	return Buffer.from(compact, 'base64');
}

/** Remove PKCS#7 padding when it is well formed; otherwise return the input. */
export function stripPkcs7Padding(data: Buffer): Buffer {
	if (data.length === 0) {
		return data;
	}
	const pad = data[data.length - 1];
	if (pad < 1 || pad > AES_BLOCK_SIZE || pad > data.length) {
		return data;
	}
	for (let i = data.length - pad; i < data.length; i += 1) {
		if (data[i] !== pad) {
			return data;
		}
	}
	return data.subarray(0, data.length - pad);
}

export class LocalCredentialDecryptor {
	private readonly log: DysonLogger;

	constructor(
		private readonly config: LocalCredentialsConfig,
		logger?: DysonLogger,
	) {
		this.log = logger ?? defaultLogger;
	}

	/**
	 * Decrypt the broker credentials of the device `serial`.
	 * Pure and synchronous: no I/O, safe from either front end.
	 */
	public decrypt(blob: string | null | undefined, serial: string): LocalCredentials {
		// 1) base64; nothing else runs on garbage input.
		if (blob === null || blob === undefined || blob.trim().length === 0) {
			throw new DecryptionError(`Device ${serial} has no local broker credentials`, 'base64');
		}
		const ciphertext = decodeBase64Strict(blob);
		if (!ciphertext) {
			throw new DecryptionError(`Local broker credentials of ${serial} are not valid base64`, 'base64');
		}

		// 2) AES-256-CBC, padding removed by hand so NUL-padded payloads survive.
		let plainBytes: Buffer;
		try {
			const decipher = createDecipheriv('aes-256-cbc', this.config.key, this.config.iv);
			decipher.setAutoPadding(false);
			plainBytes = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
		} catch (err) {
			this.log.debug(
				'Local credentials of %s failed at cipher stage; ciphertext length=%d',
				serial,
				ciphertext.length,
			);
			throw new DecryptionError(
				`Failed to decrypt local broker credentials of ${serial}: ${err instanceof Error ? err.message : String(err)}`,
				'cipher',
				{ cause: err },
			);
		}

		// 3) First JSON value only.
		const text = stripPkcs7Padding(plainBytes).toString('utf8');
		let document: unknown;
		try {
			const extracted = extractFirstJsonValue(text);
			document = extracted.value;

			const trailing = extracted.trailing.replace(/\0+$/, '');
			if (trailing.length > 0) {
				this.log.debug(
					'Local credentials of %s: ignored %d characters after the credential document',
					serial,
					trailing.length,
				);
			}
		} catch (err) {
			throw this.failure(
				serial,
				'json-extract',
				`Decrypted credentials of ${serial} do not start with a JSON value: ${err instanceof JsonExtractError ? err.message : String(err)}`,
				text,
				err,
			);
		}

		// 4) Password field; the username is the serial.
		const field = this.config.passwordField;
		if (!document || typeof document !== 'object' || Array.isArray(document) || !(field in document)) {
			throw this.failure(serial, 'field-missing', `Decrypted credentials of ${serial} have no "${field}" field`, text);
		}
		const password: unknown = Reflect.get(document, field);
		if (typeof password !== 'string') {
			throw this.failure(serial, 'field-missing', `Field "${field}" of ${serial} credentials is not a string`, text);
		}

		return Object.freeze({ username: serial, password });
	}

	// Full plaintext goes to debug only: it is the device password.
	private failure(
		serial: string,
		stage: DecryptionStage,
		message: string,
		plaintext: string,
		cause?: unknown,
	): DecryptionError {
		this.log.debug('Local credentials of %s failed at %s stage; decrypted text=%j', serial, stage, plaintext);
		return new DecryptionError(message, stage, { cause, plaintext });
	}
}
