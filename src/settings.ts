// src/settings.ts
// Static values of the Dyson cloud API. Everything here can be overridden
// through the client configuration; see src/dyson/config.ts.

/** Base URL used for every region without a dedicated host. */
export const DEFAULT_API_HOST = 'https://appapi.cp.dyson.com';

/**
 * Regional hosts, keyed by exact (upper-case) country code.
 * "cn" does not match "CN" and falls back to DEFAULT_API_HOST.
 */
export const REGIONAL_API_HOSTS: Readonly<Record<string, string>> = {
	CN: 'https://appapi.cp.dyson.cn',
};

/** The only region whose backend accepts SMS (mobile number) logins. */
export const MOBILE_LOGIN_REGION = 'CN';

export const DEFAULT_REGION = 'US';
export const DEFAULT_CULTURE = 'en-US';
export const DEFAULT_USER_AGENT = 'android client';

// Local broker credential cipher (AES-256-CBC), shared by all devices.
export const LOCAL_CREDENTIALS_KEY: Uint8Array = Uint8Array.from(
	{ length: 32 },
	(_, i) => i + 1,
);
export const LOCAL_CREDENTIALS_IV: Uint8Array = new Uint8Array(16);
export const LOCAL_CREDENTIALS_PASSWORD_FIELD = 'apPasswordHash';

export const LOCAL_MQTT_PORT = 1883;
export const LOCAL_MQTT_TLS_PORT = 8883;
export const CLOUD_MQTT_PORT = 443;
