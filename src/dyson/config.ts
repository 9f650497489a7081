// src/dyson/config.ts
// Immutable configuration of a client instance, validated once at construction.

import { z } from 'zod';

import {
	DEFAULT_API_HOST,
	DEFAULT_CULTURE,
	DEFAULT_REGION,
	DEFAULT_USER_AGENT,
	LOCAL_CREDENTIALS_IV,
	LOCAL_CREDENTIALS_KEY,
	LOCAL_CREDENTIALS_PASSWORD_FIELD,
	MOBILE_LOGIN_REGION,
	REGIONAL_API_HOSTS,
} from '../settings.js';
import { ConfigError } from './errors.js';

const bytesOfLength = (length: number, what: string) =>
	z
		.instanceof(Uint8Array)
		.refine((bytes) => bytes.length === length, {
			message: `${what} must be exactly ${length} bytes`,
		});

export const LocalCredentialsConfigSchema = z.object({
	key: bytesOfLength(32, 'Local credentials key').default(() => Uint8Array.from(LOCAL_CREDENTIALS_KEY)),
	iv: bytesOfLength(16, 'Local credentials IV').default(() => Uint8Array.from(LOCAL_CREDENTIALS_IV)),
	passwordField: z.string().min(1).default(LOCAL_CREDENTIALS_PASSWORD_FIELD),
});

export const DysonConfigSchema = z.object({
	region: z
		.string()
		.regex(/^[A-Z]{2}$/, 'Country must be a 2-letter uppercase code (e.g. US, GB, CN)')
		.default(DEFAULT_REGION),
	culture: z
		.string()
		.regex(/^[a-z]{2}-[A-Z]{2}$/, 'Culture must be a locale such as en-US')
		.default(DEFAULT_CULTURE),
	userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
	// Overrides are layered on the built-in table, so CN keeps its host.
	hosts: z
		.record(z.string(), z.string().url())
		.default({})
		.transform((overrides): Record<string, string> => ({ ...REGIONAL_API_HOSTS, ...overrides })),
	defaultHost: z.string().url().default(DEFAULT_API_HOST),
	mobileRegion: z.string().regex(/^[A-Z]{2}$/).default(MOBILE_LOGIN_REGION),
	localCredentials: LocalCredentialsConfigSchema.default({}),
});

export type DysonConfigInput = z.input<typeof DysonConfigSchema>;
export type DysonConfig = Readonly<z.output<typeof DysonConfigSchema>>;
export type LocalCredentialsConfig = Readonly<z.output<typeof LocalCredentialsConfigSchema>>;

/**
 * Validate and default the configuration. The result is frozen; a client never
 * mutates it after construction.
 */
export function resolveConfig(input: DysonConfigInput = {}): DysonConfig {
	const parsed = DysonConfigSchema.safeParse(input);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const field = issue?.path.join('.') ?? '';
		throw new ConfigError(
			`Invalid Dyson client configuration${field ? ` (${field})` : ''}: ${issue?.message ?? 'unknown error'}`,
			field || undefined,
		);
	}

	const config = parsed.data;
	Object.freeze(config.hosts);
	Object.freeze(config.localCredentials);
	return Object.freeze(config);
}
