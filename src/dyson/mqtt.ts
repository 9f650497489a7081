// src/dyson/mqtt.ts
// Connection parameters for the two MQTT brokers a device talks to. Nothing
// here opens a connection; callers hand the result to their MQTT library.

import { CLOUD_MQTT_PORT, LOCAL_MQTT_PORT, LOCAL_MQTT_TLS_PORT } from '../settings.js';
import type { Device, IotData } from './device-catalog.js';
import type { LocalCredentials } from './local-credentials.js';

export interface MqttTopics {
	readonly current: string;
	readonly faults: string;
	readonly software: string;
	readonly summary: string;
	readonly command: string;
}

export interface LocalMqttParameters {
	readonly host: string;
	readonly port: number;
	readonly tlsPort: number;
	readonly username: string;
	readonly password: string;
	readonly rootTopic: string;
	readonly topics: MqttTopics;
}

export interface CloudMqttParameters {
	readonly host: string;
	readonly port: number;
	readonly protocol: 'wss';
	readonly clientId: string;
	readonly customAuthorizerName: string;
	readonly tokenKey: string;
	readonly tokenValue: string;
	readonly tokenSignature: string;
	readonly rootTopic: string;
	readonly topics: MqttTopics;
}

/** Root topic level; older manifests omit it and the product type is used. */
export function rootTopicOf(device: Device): string {
	return device.mqttRootTopicLevel || device.productType;
}

export function mqttTopics(rootTopic: string, serial: string): MqttTopics {
	const base = `${rootTopic}/${serial}`;
	return Object.freeze({
		current: `${base}/status/current`,
		faults: `${base}/status/faults`,
		software: `${base}/status/software`,
		summary: `${base}/status/summary`,
		command: `${base}/command`,
	});
}

/**
 * Parameters for the broker running on the device itself. The host defaults
 * to the mDNS name `<serial>.local`; pass an address when it is known.
 */
export function localMqttParameters(
	device: Device,
	credentials: LocalCredentials,
	host?: string,
): LocalMqttParameters {
	const rootTopic = rootTopicOf(device);
	return Object.freeze({
		host: host ?? `${device.serial}.local`,
		port: LOCAL_MQTT_PORT,
		tlsPort: LOCAL_MQTT_TLS_PORT,
		username: credentials.username,
		password: credentials.password,
		rootTopic,
		topics: mqttTopics(rootTopic, device.serial),
	});
}

/** Parameters for the AWS IoT endpoint returned by getIotCredentials(). */
export function cloudMqttParameters(device: Device, iotData: IotData): CloudMqttParameters {
	const rootTopic = rootTopicOf(device);
	const parameters: CloudMqttParameters = {
		host: iotData.endpoint,
		port: CLOUD_MQTT_PORT,
		protocol: 'wss',
		clientId: iotData.credentials.clientId,
		customAuthorizerName: iotData.credentials.customAuthorizerName,
		tokenKey: iotData.credentials.tokenKey,
		tokenValue: iotData.credentials.tokenValue,
		tokenSignature: iotData.credentials.tokenSignature,
		rootTopic,
		topics: mqttTopics(rootTopic, device.serial),
	};
	return Object.freeze(parameters);
}
