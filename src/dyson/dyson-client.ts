// src/dyson/dyson-client.ts
import { resolveConfig, type DysonConfigInput } from './config.js';
import type { BearerCredential } from './credential-vault.js';
import type { Device, IotData, PendingRelease, UserStatus } from './device-catalog.js';
import { runExchangeAsync } from './exchange.js';
import type { AccountIdentifier } from './identifier.js';
import type { LocalCredentials } from './local-credentials.js';
import { consoleLogger, type DysonLogger } from './logger.js';
import {
	DysonProtocol,
	type AuthenticationResult,
	type AuthState,
	type Challenge,
	type CompleteLoginParams,
	type CompleteMobileLoginParams,
} from './protocol.js';
import { FetchTransport, type Transport } from './transport.js';

/** Construction options shared by both front ends. */
export type DysonClientBaseOptions = DysonConfigInput & {
	/** Default account identifier (email address, or +<digits> in CN). */
	identifier?: string;
	/** Account password; sent on verification only when set. */
	password?: string;
	/** Previously exported bearer token. */
	token?: string | BearerCredential;
	/** Replaces the console logger; its debug level is then the caller's concern. */
	logger?: DysonLogger;
	/** Print debug lines from the console logger. Ignored when `logger` is set. */
	debug?: boolean;
};

export type DysonClientOptions = DysonClientBaseOptions & {
	/** Defaults to a FetchTransport over the global fetch. */
	transport?: Transport;
};

/** Split client-only options from the validated configuration. */
export function createProtocol(options: DysonClientBaseOptions, logPrefix: string): DysonProtocol {
	const { identifier, password, token, logger, debug, ...configInput } = options;
	return new DysonProtocol({
		config: resolveConfig(configInput),
		identifier,
		password,
		token,
		logger: logger ?? consoleLogger(logPrefix, { debug }),
	});
}

/**
 * Promise-based Dyson cloud client. Every call suspends at the transport and
 * nowhere else; one instance serves one flow of control.
 */
export class DysonClient {
	public readonly protocol: DysonProtocol;
	private readonly transport: Transport;

	constructor(options: DysonClientOptions = {}) {
		const { transport, ...rest } = options;
		this.protocol = createProtocol(rest, '[dyson-client]');
		this.transport = transport ?? new FetchTransport();
	}

	public get authState(): AuthState {
		return this.protocol.authState;
	}

	public get provisioned(): boolean {
		return this.protocol.provisioned;
	}

	public get apiHost(): string {
		return this.protocol.apiHost;
	}

	public provision(): Promise<string> {
		return runExchangeAsync(this.protocol.provision(), this.transport);
	}

	public getUserStatus(identifier?: string | AccountIdentifier): Promise<UserStatus> {
		return runExchangeAsync(this.protocol.getUserStatus(identifier), this.transport);
	}

	public getUserStatusMobile(mobile: string): Promise<UserStatus> {
		return runExchangeAsync(this.protocol.getUserStatusMobile(mobile), this.transport);
	}

	public beginLogin(identifier?: string | AccountIdentifier): Promise<Challenge> {
		return runExchangeAsync(this.protocol.beginLogin(identifier), this.transport);
	}

	public beginLoginMobile(mobile: string): Promise<Challenge> {
		return runExchangeAsync(this.protocol.beginLoginMobile(mobile), this.transport);
	}

	public completeLogin(params: CompleteLoginParams): Promise<BearerCredential> {
		return runExchangeAsync(this.protocol.completeLogin(params), this.transport);
	}

	public completeLoginMobile(params: CompleteMobileLoginParams): Promise<BearerCredential> {
		return runExchangeAsync(this.protocol.completeLoginMobile(params), this.transport);
	}

	public authenticate(otpCode?: string, identifier?: string | AccountIdentifier): Promise<AuthenticationResult> {
		return runExchangeAsync(this.protocol.authenticate(otpCode, identifier), this.transport);
	}

	public listDevices(): Promise<readonly Device[]> {
		return runExchangeAsync(this.protocol.listDevices(), this.transport);
	}

	public getIotCredentials(serial: string): Promise<IotData> {
		return runExchangeAsync(this.protocol.getIotCredentials(serial), this.transport);
	}

	public getPendingRelease(serial: string): Promise<PendingRelease> {
		return runExchangeAsync(this.protocol.getPendingRelease(serial), this.transport);
	}

	// No I/O below: plain synchronous calls on both front ends.

	public decryptLocalCredentials(blob: string | null | undefined, serial: string): LocalCredentials {
		return this.protocol.decryptLocalCredentials(blob, serial);
	}

	public getToken(): BearerCredential | null {
		return this.protocol.getToken();
	}

	public setToken(token: string | BearerCredential | null): void {
		this.protocol.setToken(token);
	}
}
