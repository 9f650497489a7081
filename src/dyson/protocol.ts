// src/dyson/protocol.ts
// Transport-free core of the Dyson cloud client: provisioning, the OTP login
// state machine, the credential vault and the catalog lookups. Every network
// operation is an Exchange (see exchange.ts); DysonClient and DysonSyncClient
// only choose how the yielded requests are sent.

import type { DysonConfig } from './config.js';
import { bearerCredential, CredentialVault, type BearerCredential } from './credential-vault.js';
import {
	devicesFromResponse,
	iotDataFromResponse,
	pendingReleaseFromResponse,
	userStatusFromResponse,
	type Device,
	type IotData,
	type PendingRelease,
	type UserStatus,
} from './device-catalog.js';
import {
	AuthUnauthorizedError,
	ConfigError,
	InvalidIdentifierError,
	InvalidStateError,
	ProtocolError,
	statusToError,
	type StatusContext,
} from './errors.js';
import type { Exchange } from './exchange.js';
import {
	identifierKey,
	requireMobileIdentifier,
	resolveApiHost,
	resolveIdentifier,
	type AccountIdentifier,
} from './identifier.js';
import { LocalCredentialDecryptor, type LocalCredentials } from './local-credentials.js';
import { consoleLogger, type DysonLogger } from './logger.js';
import {
	DeviceListResponseSchema,
	IotDataResponseSchema,
	LoginChallengeResponseSchema,
	LoginInformationResponseSchema,
	parsePayload,
	PendingReleaseResponseSchema,
	ProvisionVersionSchema,
	UserStatusResponseSchema,
} from './schemas.js';
import type { HttpMethod, HttpRequest, HttpResponse } from './transport.js';

export type AuthState = 'unstarted' | 'challenge-issued' | 'authenticated';

export interface Challenge {
	readonly challengeId: string;
	readonly issuedAt: Date;
	readonly identifier: AccountIdentifier;
}

export type AuthenticationResult =
	| { readonly status: 'pending'; readonly challenge: Challenge }
	| { readonly status: 'authenticated'; readonly credential: BearerCredential };

export interface CompleteLoginParams {
	otpCode: string;
	/** Defaults to the identifier given at construction. */
	identifier?: string | AccountIdentifier;
	/** Defaults to the challenge tracked for the identifier. */
	challengeId?: string;
	/** Defaults to the password given at construction; omitted when unset. */
	password?: string;
}

export interface CompleteMobileLoginParams extends Omit<CompleteLoginParams, 'identifier'> {
	mobile: string;
}

export interface DysonProtocolOptions {
	config: DysonConfig;
	identifier?: string;
	password?: string;
	/** Previously exported bearer token; skips the login flow. */
	token?: string | BearerCredential;
	logger?: DysonLogger;
}

const PROVISION_PATH = '/v1/provisioningservice/application/Android/version';
const MANIFEST_PATH = '/v3/manifest';
const IOT_CREDENTIALS_PATH = '/v2/authorize/iot-credentials';

const userRegistrationPath = (identifier: AccountIdentifier, action: 'userstatus' | 'auth' | 'verify') =>
	`/v3/userregistration/${identifier.kind}/${action}`;

const pendingReleasePath = (serial: string) =>
	`/v1/assets/devices/${encodeURIComponent(serial)}/pendingrelease`;

const defaultLogger: DysonLogger = consoleLogger('[dyson-protocol]');

export class DysonProtocol {
	public readonly config: DysonConfig;

	private readonly log: DysonLogger;
	private readonly vault = new CredentialVault();
	private readonly decryptor: LocalCredentialDecryptor;
	private readonly challenges = new Map<string, Challenge>();
	private readonly identifier?: string;
	private readonly password?: string;

	private state: AuthState = 'unstarted';
	private provisionVersion: string | null = null;

	constructor(options: DysonProtocolOptions) {
		this.config = options.config;
		this.log = options.logger ?? defaultLogger;
		this.identifier = options.identifier;
		this.password = options.password;
		this.decryptor = new LocalCredentialDecryptor(this.config.localCredentials, this.log);

		if (options.token !== undefined) {
			this.setToken(options.token);
		}
	}

	// ==========================================================================
	// State
	// ==========================================================================

	public get authState(): AuthState {
		return this.state;
	}

	/** Informational only; no operation is gated on it. */
	public get provisioned(): boolean {
		return this.provisionVersion !== null;
	}

	public get provisionedVersion(): string | null {
		return this.provisionVersion;
	}

	public get apiHost(): string {
		return resolveApiHost(this.config.region, this.config);
	}

	/** Challenge currently tracked for `identifier`, if any. */
	public pendingChallenge(identifier?: string | AccountIdentifier): Challenge | undefined {
		return this.challenges.get(identifierKey(this.resolve(identifier)));
	}

	public getToken(): BearerCredential | null {
		return this.vault.get();
	}

	/**
	 * Import or clear the bearer credential. No request is made: the server
	 * judges the token on the next authenticated call.
	 */
	public setToken(token: string | BearerCredential | null): void {
		if (token === null) {
			this.vault.clear();
			this.state = this.challenges.size > 0 ? 'challenge-issued' : 'unstarted';
			this.log.debug('Bearer token cleared; state=%s', this.state);
			return;
		}

		const credential = typeof token === 'string' ? bearerCredential(token.trim()) : token;
		if (credential.token.length === 0) {
			throw new ConfigError('Bearer token must be a non-empty string', 'token');
		}
		this.vault.set(credential);
		this.state = 'authenticated';
		this.log.debug('Bearer token imported; state=authenticated');
	}

	// ==========================================================================
	// Provisioning
	// ==========================================================================

	public *provision(): Exchange<string> {
		const response = yield this.request('GET', PROVISION_PATH);
		this.expectOk(response, 'Provisioning', 'api');

		const { body } = response;
		let version: string;
		if (body.kind === 'text') {
			version = body.value.trim();
			if (version.length === 0) {
				throw new ProtocolError('Provisioning returned an empty version', { status: response.status });
			}
		} else if (typeof body.value === 'number') {
			version = String(body.value);
		} else {
			version = parsePayload(ProvisionVersionSchema, body, 'Provisioning');
		}

		this.provisionVersion = version;
		this.log.debug('Provisioned against %s; app version=%s', this.apiHost, version);
		return version;
	}

	// ==========================================================================
	// Login
	// ==========================================================================

	public *getUserStatus(identifier?: string | AccountIdentifier): Exchange<UserStatus> {
		return yield* this.userStatusFor(this.resolve(identifier));
	}

	public *getUserStatusMobile(mobile: string): Exchange<UserStatus> {
		return yield* this.userStatusFor(requireMobileIdentifier(mobile, this.config.region, this.config));
	}

	public *beginLogin(identifier?: string | AccountIdentifier): Exchange<Challenge> {
		return yield* this.beginFor(this.resolve(identifier));
	}

	public *beginLoginMobile(mobile: string): Exchange<Challenge> {
		return yield* this.beginFor(requireMobileIdentifier(mobile, this.config.region, this.config));
	}

	public *completeLogin(params: CompleteLoginParams): Exchange<BearerCredential> {
		return yield* this.completeFor(this.resolve(params.identifier), params);
	}

	public *completeLoginMobile(params: CompleteMobileLoginParams): Exchange<BearerCredential> {
		const identifier = requireMobileIdentifier(params.mobile, this.config.region, this.config);
		return yield* this.completeFor(identifier, params);
	}

	/**
	 * Without an OTP code: request a challenge and report it as pending, so the
	 * caller can prompt for the code and call again. With a code: request a
	 * fresh challenge and complete it immediately.
	 */
	public *authenticate(otpCode?: string, identifier?: string | AccountIdentifier): Exchange<AuthenticationResult> {
		const account = this.resolve(identifier);
		const challenge = yield* this.beginFor(account);

		const code = otpCode?.trim() ?? '';
		if (code.length === 0) {
			const pending: AuthenticationResult = { status: 'pending', challenge };
			return Object.freeze(pending);
		}

		const credential = yield* this.completeFor(account, {
			otpCode: code,
			challengeId: challenge.challengeId,
		});
		const authenticated: AuthenticationResult = { status: 'authenticated', credential };
		return Object.freeze(authenticated);
	}

	// ==========================================================================
	// Catalog
	// ==========================================================================

	public *listDevices(): Exchange<readonly Device[]> {
		const authorization = this.requireAuthorization('Device listing');
		const response = yield this.request('GET', MANIFEST_PATH, { authorization });
		this.expectOk(response, 'Device listing', 'api');

		const devices = devicesFromResponse(parsePayload(DeviceListResponseSchema, response.body, 'Device listing'));
		this.log.debug('Manifest listed %d device(s)', devices.length);
		return devices;
	}

	public *getIotCredentials(serial: string): Exchange<IotData> {
		const authorization = this.requireAuthorization('IoT credentials lookup');
		const response = yield this.request('POST', IOT_CREDENTIALS_PATH, {
			authorization,
			body: { Serial: this.requireSerial(serial) },
		});
		this.expectOk(response, 'IoT credentials lookup', 'api');

		return iotDataFromResponse(parsePayload(IotDataResponseSchema, response.body, 'IoT credentials lookup'));
	}

	public *getPendingRelease(serial: string): Exchange<PendingRelease> {
		const authorization = this.requireAuthorization('Pending release lookup');
		const response = yield this.request('GET', pendingReleasePath(this.requireSerial(serial)), { authorization });
		this.expectOk(response, 'Pending release lookup', 'api');

		return pendingReleaseFromResponse(
			parsePayload(PendingReleaseResponseSchema, response.body, 'Pending release lookup'),
		);
	}

	// ==========================================================================
	// Local credentials (no I/O)
	// ==========================================================================

	public decryptLocalCredentials(blob: string | null | undefined, serial: string): LocalCredentials {
		return this.decryptor.decrypt(blob, serial);
	}

	/** Decrypt the broker credentials carried by a manifest record. */
	public localCredentialsFor(device: Device): LocalCredentials {
		return this.decryptor.decrypt(device.encryptedLocalCredentials, device.serial);
	}

	// ==========================================================================
	// Internals
	// ==========================================================================

	private *userStatusFor(identifier: AccountIdentifier): Exchange<UserStatus> {
		const response = yield this.request('POST', userRegistrationPath(identifier, 'userstatus'), {
			query: { country: this.config.region },
			body: { [identifier.kind]: identifier.value },
		});
		this.expectOk(response, 'User status lookup', 'auth');

		return userStatusFromResponse(parsePayload(UserStatusResponseSchema, response.body, 'User status lookup'));
	}

	private *beginFor(identifier: AccountIdentifier): Exchange<Challenge> {
		const response = yield this.request('POST', userRegistrationPath(identifier, 'auth'), {
			query: { country: this.config.region, culture: this.config.culture },
			body: { [identifier.kind]: identifier.value },
		});
		this.expectOk(response, 'Login request', 'auth');

		const { challengeId } = parsePayload(LoginChallengeResponseSchema, response.body, 'Login request');
		const challenge: Challenge = Object.freeze({ challengeId, issuedAt: new Date(), identifier });

		// A newer challenge for the same account supersedes the previous one.
		this.challenges.set(identifierKey(identifier), challenge);
		this.state = 'challenge-issued';
		this.log.info('One-time code sent by %s; waiting for verification', identifier.kind);
		return challenge;
	}

	private *completeFor(
		identifier: AccountIdentifier,
		params: Omit<CompleteLoginParams, 'identifier'>,
	): Exchange<BearerCredential> {
		const otpCode = params.otpCode.trim();
		if (otpCode.length === 0) {
			throw new InvalidStateError('A one-time code is required to complete the login');
		}

		const key = identifierKey(identifier);
		const challengeId = params.challengeId ?? this.challenges.get(key)?.challengeId;
		if (challengeId === undefined) {
			throw new InvalidStateError(
				`No login challenge is pending for this ${identifier.kind}; call beginLogin first`,
			);
		}

		const password = params.password ?? this.password;
		const response = yield this.request('POST', userRegistrationPath(identifier, 'verify'), {
			body: {
				challengeId,
				[identifier.kind]: identifier.value,
				otpCode,
				...(password !== undefined ? { password } : {}),
			},
		});
		this.expectOk(response, 'Login verification', 'auth');

		const info = parsePayload(LoginInformationResponseSchema, response.body, 'Login verification');
		const credential = bearerCredential(info.token, info.account);

		this.vault.set(credential);
		this.challenges.delete(key);
		this.state = 'authenticated';
		this.log.info('Login complete; account=%s', info.account);
		return credential;
	}

	private resolve(identifier: string | AccountIdentifier | undefined): AccountIdentifier {
		const raw = identifier ?? this.identifier;
		if (raw === undefined) {
			throw new InvalidIdentifierError(
				'An email address or mobile number is required; pass one or set it when creating the client',
				'',
			);
		}
		return resolveIdentifier(raw, this.config.region, this.config);
	}

	private requireAuthorization(what: string): string {
		const header = this.vault.authorizationHeader();
		if (header === null) {
			throw new AuthUnauthorizedError(`${what} requires a bearer token; log in or call setToken() first`);
		}
		return header;
	}

	private requireSerial(serial: string): string {
		const value = serial.trim();
		if (value.length === 0) {
			throw new ConfigError('A device serial number is required', 'serial');
		}
		return value;
	}

	private request(
		method: HttpMethod,
		path: string,
		options: { query?: Record<string, string>; body?: unknown; authorization?: string } = {},
	): HttpRequest {
		const headers: Record<string, string> = {
			'User-Agent': this.config.userAgent,
			Accept: 'application/json',
		};
		if (options.body !== undefined) {
			headers['Content-Type'] = 'application/json';
		}
		if (options.authorization !== undefined) {
			headers.Authorization = options.authorization;
		}

		return {
			method,
			host: this.apiHost,
			path,
			...(options.query ? { query: options.query } : {}),
			headers,
			...(options.body !== undefined ? { body: options.body } : {}),
		};
	}

	private expectOk(response: HttpResponse, what: string, context: StatusContext): void {
		if (response.status >= 200 && response.status < 300) {
			return;
		}
		this.log.debug('%s failed; status=%d', what, response.status);
		throw statusToError(response.status, what, context, response.body.value);
	}
}
