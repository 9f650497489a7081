// src/dyson/schemas.ts
// Wire shapes of the Dyson cloud API. One schema per response; parsePayload()
// turns a mismatch into a ProtocolError naming the offending field.

import { z } from 'zod';

import { ProtocolError } from './errors.js';
import type { ResponseBody } from './transport.js';

// ============================================================================
// Provisioning & login
// ============================================================================

export const ProvisionVersionSchema = z.string().trim().min(1);

export const UserStatusResponseSchema = z.object({
	accountStatus: z.string().min(1),
	authenticationMethod: z.string().min(1),
});

export type UserStatusResponse = z.infer<typeof UserStatusResponseSchema>;

export const LoginChallengeResponseSchema = z.object({
	challengeId: z.string().min(1),
});

export type LoginChallengeResponse = z.infer<typeof LoginChallengeResponseSchema>;

export const LoginInformationResponseSchema = z.object({
	account: z.string().min(1),
	token: z.string().min(1),
	tokenType: z.literal('Bearer'),
});

export type LoginInformationResponse = z.infer<typeof LoginInformationResponseSchema>;

// ============================================================================
// Device manifest
// ============================================================================

export const FirmwareResponseSchema = z.object({
	version: z.string(),
	autoUpdateEnabled: z.boolean(),
	newVersionAvailable: z.boolean(),
	capabilities: z.array(z.string()).nullish(),
	minimumAppVersion: z.string().nullish(),
});

export const MqttResponseSchema = z.object({
	localBrokerCredentials: z.string(),
	mqttRootTopicLevel: z.string(),
	remoteBrokerType: z.string(),
});

export const DeviceResponseSchema = z.object({
	serialNumber: z.string().min(1),
	name: z.string().nullish(),
	type: z.string().min(1),
	model: z.string().nullish(),
	variant: z.string().nullish(),
	category: z.string().min(1),
	connectionCategory: z.string().min(1),
	connectedConfiguration: z
		.object({
			firmware: FirmwareResponseSchema,
			mqtt: MqttResponseSchema,
		})
		.nullish(),
});

export type DeviceResponse = z.infer<typeof DeviceResponseSchema>;

export const DeviceListResponseSchema = z.array(DeviceResponseSchema);

// ============================================================================
// Per-device lookups
// ============================================================================

export const IotCredentialsResponseSchema = z.object({
	ClientId: z.string().min(1),
	CustomAuthorizerName: z.string().min(1),
	TokenKey: z.string().min(1),
	TokenSignature: z.string().min(1),
	TokenValue: z.string().min(1),
});

export const IotDataResponseSchema = z.object({
	Endpoint: z.string().min(1),
	IoTCredentials: IotCredentialsResponseSchema,
});

export type IotDataResponse = z.infer<typeof IotDataResponseSchema>;

export const PendingReleaseResponseSchema = z.object({
	version: z.string().min(1),
	pushed: z.boolean(),
});

export type PendingReleaseResponse = z.infer<typeof PendingReleaseResponseSchema>;

// ============================================================================
// Parsing
// ============================================================================

/** ['IoTCredentials', 'TokenKey'] -> "IoTCredentials.TokenKey", [0, 'name'] -> "[0].name" */
export function formatFieldPath(path: ReadonlyArray<string | number>): string {
	return path.reduce<string>((acc, segment) => {
		if (typeof segment === 'number') {
			return `${acc}[${segment}]`;
		}
		return acc ? `${acc}.${segment}` : segment;
	}, '');
}

export function parsePayload<S extends z.ZodTypeAny>(
	schema: S,
	body: ResponseBody,
	what: string,
): z.output<S> {
	if (body.kind !== 'json') {
		throw new ProtocolError(`${what} returned a non-JSON payload`, {
			details: body.value.slice(0, 200),
		});
	}

	const parsed = schema.safeParse(body.value);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const field = issue ? formatFieldPath(issue.path) : undefined;
		throw new ProtocolError(
			`${what} returned an unexpected payload${field ? ` (field ${field})` : ''}: ${issue?.message ?? 'invalid'}`,
			{ field: field || undefined, details: parsed.error.issues },
		);
	}
	return parsed.data;
}
