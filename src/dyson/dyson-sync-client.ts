// src/dyson/dyson-sync-client.ts
import type { BearerCredential } from './credential-vault.js';
import type { Device, IotData, PendingRelease, UserStatus } from './device-catalog.js';
import { createProtocol, type DysonClientBaseOptions } from './dyson-client.js';
import { runExchange } from './exchange.js';
import type { AccountIdentifier } from './identifier.js';
import type { LocalCredentials } from './local-credentials.js';
import type {
	AuthenticationResult,
	AuthState,
	Challenge,
	CompleteLoginParams,
	CompleteMobileLoginParams,
	DysonProtocol,
} from './protocol.js';
import type { SyncTransport } from './transport.js';

export type DysonSyncClientOptions = DysonClientBaseOptions & {
	/** Node has no blocking HTTP client, so one must be supplied. */
	transport: SyncTransport;
};

/**
 * Blocking Dyson cloud client: same operations, same request sequence and the
 * same errors as DysonClient, but every call returns only once its
 * SyncTransport has answered.
 */
export class DysonSyncClient {
	public readonly protocol: DysonProtocol;
	private readonly transport: SyncTransport;

	constructor(options: DysonSyncClientOptions) {
		const { transport, ...rest } = options;
		this.protocol = createProtocol(rest, '[dyson-sync-client]');
		this.transport = transport;
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

	public provision(): string {
		return runExchange(this.protocol.provision(), this.transport);
	}

	public getUserStatus(identifier?: string | AccountIdentifier): UserStatus {
		return runExchange(this.protocol.getUserStatus(identifier), this.transport);
	}

	public getUserStatusMobile(mobile: string): UserStatus {
		return runExchange(this.protocol.getUserStatusMobile(mobile), this.transport);
	}

	public beginLogin(identifier?: string | AccountIdentifier): Challenge {
		return runExchange(this.protocol.beginLogin(identifier), this.transport);
	}

	public beginLoginMobile(mobile: string): Challenge {
		return runExchange(this.protocol.beginLoginMobile(mobile), this.transport);
	}

	public completeLogin(params: CompleteLoginParams): BearerCredential {
		return runExchange(this.protocol.completeLogin(params), this.transport);
	}

	public completeLoginMobile(params: CompleteMobileLoginParams): BearerCredential {
		return runExchange(this.protocol.completeLoginMobile(params), this.transport);
	}

	public authenticate(otpCode?: string, identifier?: string | AccountIdentifier): AuthenticationResult {
		return runExchange(this.protocol.authenticate(otpCode, identifier), this.transport);
	}

	public listDevices(): readonly Device[] {
		return runExchange(this.protocol.listDevices(), this.transport);
	}

	public getIotCredentials(serial: string): IotData {
		return runExchange(this.protocol.getIotCredentials(serial), this.transport);
	}

	public getPendingRelease(serial: string): PendingRelease {
		return runExchange(this.protocol.getPendingRelease(serial), this.transport);
	}

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
