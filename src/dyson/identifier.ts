// src/dyson/identifier.ts
// Account identifier classification and regional host selection.
// Every check here runs before a request is built, so a bad identifier never
// costs a round trip.

import type { DysonConfig } from './config.js';
import { InvalidIdentifierError } from './errors.js';

export type AccountIdentifier =
	| { readonly kind: 'email'; readonly value: string }
	| { readonly kind: 'mobile'; readonly value: string };

export type IdentifierKind = AccountIdentifier['kind'];

// Country code + subscriber number, E.164 style.
const MOBILE_PATTERN = /^\+\d{6,15}$/;

type RegionConfig = Pick<DysonConfig, 'hosts' | 'defaultHost' | 'mobileRegion'>;

/**
 * Shape-only classification: no "@" and a leading "+" is a mobile number,
 * everything else is treated as an email address.
 */
export function classifyIdentifier(raw: string): AccountIdentifier {
	const value = raw.trim();
	if (value.length === 0) {
		throw new InvalidIdentifierError('An email address or mobile number is required', raw);
	}

	if (!value.includes('@') && value.startsWith('+')) {
		return { kind: 'mobile', value };
	}
	return { kind: 'email', value };
}

function assertMobileUsable(identifier: AccountIdentifier, region: string, config: RegionConfig): void {
	if (!MOBILE_PATTERN.test(identifier.value)) {
		throw new InvalidIdentifierError(
			`Mobile number must be "+" followed by the country code and digits (e.g. +8613800000000); got ${identifier.value}`,
			identifier.value,
		);
	}
	if (region !== config.mobileRegion) {
		throw new InvalidIdentifierError(
			`Mobile login is only available in region ${config.mobileRegion}; this client is configured for ${region}`,
			identifier.value,
		);
	}
}

/**
 * Classify `raw` and check that the result can be used in `region`.
 * Accepts an already classified identifier and re-checks it.
 */
export function resolveIdentifier(
	raw: string | AccountIdentifier,
	region: string,
	config: RegionConfig,
): AccountIdentifier {
	const identifier = typeof raw === 'string' ? classifyIdentifier(raw) : raw;
	if (identifier.kind === 'mobile') {
		assertMobileUsable(identifier, region, config);
	}
	return identifier;
}

/**
 * Used by the explicit mobile operations: the value must be a mobile number
 * with its country-code prefix, whatever it would otherwise classify as.
 */
export function requireMobileIdentifier(
	raw: string,
	region: string,
	config: RegionConfig,
): AccountIdentifier {
	const value = raw.trim();
	if (!value.startsWith('+')) {
		throw new InvalidIdentifierError(
			`Mobile number must include the country code prefix (e.g. +8613800000000); got ${value || '(empty)'}`,
			raw,
		);
	}
	const identifier: AccountIdentifier = { kind: 'mobile', value };
	assertMobileUsable(identifier, region, config);
	return identifier;
}

export function resolveApiHost(region: string, config: RegionConfig): string {
	return config.hosts[region] ?? config.defaultHost;
}

/** Stable key for per-identifier bookkeeping (challenge tracking). */
export function identifierKey(identifier: AccountIdentifier): string {
	return `${identifier.kind}:${identifier.value.toLowerCase()}`;
}
