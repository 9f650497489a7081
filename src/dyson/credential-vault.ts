// src/dyson/credential-vault.ts

export interface BearerCredential {
	readonly token: string;
	readonly tokenType: 'Bearer';
	/** Account id reported at login; unknown for an imported bare token. */
	readonly accountId: string | null;
}

/**
 * In-memory holder of the bearer credential for one client instance.
 *
 * Nothing is written to disk: callers that want to reuse a session export the
 * token with get() and hand it back to a later client with set(). Validity is
 * decided by the server on the next authenticated call, never locally.
 *
 * No locking; an instance belongs to a single logical caller.
 */
export class CredentialVault {
	private credential: BearerCredential | null = null;

	public get(): BearerCredential | null {
		return this.credential;
	}

	public set(credential: BearerCredential | null): void {
		this.credential = credential ? Object.freeze({ ...credential }) : null;
	}

	public clear(): void {
		this.credential = null;
	}

	public hasCredential(): boolean {
		return this.credential !== null;
	}

	/** Value for the Authorization header, or null when nothing is held. */
	public authorizationHeader(): string | null {
		return this.credential ? `${this.credential.tokenType} ${this.credential.token}` : null;
	}
}

export function bearerCredential(token: string, accountId: string | null = null): BearerCredential {
	const credential: BearerCredential = { token, tokenType: 'Bearer', accountId };
	return Object.freeze(credential);
}
