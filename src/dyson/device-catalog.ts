// src/dyson/device-catalog.ts
// Typed records for the device manifest and per-device lookups, plus the
// translation from wire shapes. Records are frozen snapshots.

import type { DeviceResponse, IotDataResponse, PendingReleaseResponse, UserStatusResponse } from './schemas.js';

/** Connectivity modes seen in the manifest. */
export type ConnectionCategory = 'lecAndWifi' | 'lecOnly' | 'nonConnected' | 'wifiOnly';

/** Categories seen in the manifest (ec = environment care). */
export type DeviceCategory = 'ec' | 'flrc' | 'hc' | 'light' | 'robot' | 'wearable';

export interface Device {
	readonly serial: string;
	readonly name: string;
	/** Backend "type", e.g. "438"; also the default MQTT root topic. */
	readonly productType: string;
	readonly model?: string;
	readonly variant?: string;
	/** See DeviceCategory; unknown values are kept as sent. */
	readonly category: string;
	/** See ConnectionCategory; unknown values are kept as sent. */
	readonly connectionCategory: string;
	readonly firmwareVersion?: string;
	readonly autoUpdateEnabled?: boolean;
	readonly newVersionAvailable?: boolean;
	readonly capabilities: readonly string[];
	/** Base64 ciphertext of the local broker credentials. */
	readonly encryptedLocalCredentials?: string;
	readonly mqttRootTopicLevel?: string;
	readonly remoteBrokerType?: string;
}

export interface IotCredentials {
	readonly clientId: string;
	readonly customAuthorizerName: string;
	readonly tokenKey: string;
	readonly tokenSignature: string;
	readonly tokenValue: string;
}

export interface IotData {
	readonly endpoint: string;
	readonly credentials: IotCredentials;
}

export interface PendingRelease {
	readonly version: string;
	readonly pushed: boolean;
}

export interface UserStatus {
	/** e.g. ACTIVE or UNREGISTERED */
	readonly accountStatus: string;
	/** e.g. EMAIL_PWD_2FA */
	readonly authenticationMethod: string;
}

const LOCAL_BROKER_CATEGORIES: ReadonlySet<string> = new Set(['wifiOnly', 'lecAndWifi'] satisfies ConnectionCategory[]);

export function deviceFromResponse(raw: DeviceResponse): Device {
	const config = raw.connectedConfiguration ?? undefined;
	const localCredentials = config?.mqtt.localBrokerCredentials;

	return Object.freeze({
		serial: raw.serialNumber,
		name: raw.name ?? '',
		productType: raw.type,
		model: raw.model ?? undefined,
		variant: raw.variant ?? undefined,
		category: raw.category,
		connectionCategory: raw.connectionCategory,
		firmwareVersion: config?.firmware.version,
		autoUpdateEnabled: config?.firmware.autoUpdateEnabled,
		newVersionAvailable: config?.firmware.newVersionAvailable,
		capabilities: Object.freeze([...(config?.firmware.capabilities ?? [])]),
		encryptedLocalCredentials: localCredentials ? localCredentials : undefined,
		mqttRootTopicLevel: config?.mqtt.mqttRootTopicLevel,
		remoteBrokerType: config?.mqtt.remoteBrokerType,
	});
}

/** Backend order is kept; the list is never re-sorted. */
export function devicesFromResponse(raw: readonly DeviceResponse[]): readonly Device[] {
	return Object.freeze(raw.map(deviceFromResponse));
}

export function iotDataFromResponse(raw: IotDataResponse): IotData {
	return Object.freeze({
		endpoint: raw.Endpoint,
		credentials: Object.freeze({
			clientId: raw.IoTCredentials.ClientId,
			customAuthorizerName: raw.IoTCredentials.CustomAuthorizerName,
			tokenKey: raw.IoTCredentials.TokenKey,
			tokenSignature: raw.IoTCredentials.TokenSignature,
			tokenValue: raw.IoTCredentials.TokenValue,
		}),
	});
}

export function pendingReleaseFromResponse(raw: PendingReleaseResponse): PendingRelease {
	return Object.freeze({ version: raw.version, pushed: raw.pushed });
}

export function userStatusFromResponse(raw: UserStatusResponse): UserStatus {
	return Object.freeze({
		accountStatus: raw.accountStatus,
		authenticationMethod: raw.authenticationMethod,
	});
}

/**
 * Whether the device runs a local MQTT broker whose credentials can be
 * decrypted: Wi-Fi capable and shipped with an encrypted blob.
 */
export function supportsLocalBroker(device: Device): boolean {
	return LOCAL_BROKER_CATEGORIES.has(device.connectionCategory) && device.encryptedLocalCredentials !== undefined;
}
