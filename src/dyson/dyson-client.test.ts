import { afterEach, describe, expect, it, vi } from 'vitest';

import { AsyncStubTransport, encryptCredentials, json, StubTransport, type StubReply } from '../testing/stub-transport.js';
import { DysonClient } from './dyson-client.js';
import { DysonSyncClient } from './dyson-sync-client.js';
import { ConfigError, DecryptionError, InvalidIdentifierError, TransportError } from './errors.js';
import { silentLogger } from './logger.js';

const EMAIL = 'user@example.com';

const MANIFEST = [
	{
		serialNumber: 'AB1-EU-TEST0001',
		name: 'Bedroom',
		type: '527',
		category: 'ec',
		connectionCategory: 'wifiOnly',
		connectedConfiguration: {
			firmware: { version: '527.1', autoUpdateEnabled: true, newVersionAvailable: false },
			mqtt: {
				localBrokerCredentials: encryptCredentials('{"apPasswordHash": "test-password"}'),
				mqttRootTopicLevel: '527',
				remoteBrokerType: 'wss',
			},
		},
	},
];

function loginReplies(): StubReply[] {
	return [
		json(200, '5.0.21061'),
		json(200, { challengeId: 'challenge-1' }),
		json(200, { account: 'account-1', token: 'test-token', tokenType: 'Bearer' }),
		json(200, MANIFEST),
	];
}

// ============================================================================
// Async front end
// ============================================================================

describe('DysonClient', () => {
	it('should run the email login flow and decrypt local credentials', async () => {
		const transport = new AsyncStubTransport(loginReplies());
		const client = new DysonClient({ identifier: EMAIL, transport, logger: silentLogger });

		await client.provision();
		const pending = await client.authenticate();
		expect(pending.status).toBe('pending');
		await client.completeLogin({ otpCode: '123456' });
		const devices = await client.listDevices();

		expect(client.authState).toBe('authenticated');
		expect(client.getToken()?.token).toBe('test-token');
		expect(devices).toHaveLength(1);
		expect(client.decryptLocalCredentials(devices[0]?.encryptedLocalCredentials, 'AB1-EU-TEST0001')).toEqual({
			username: 'AB1-EU-TEST0001',
			password: 'test-password',
		});
		expect(transport.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
			'GET /v1/provisioningservice/application/Android/version',
			'POST /v3/userregistration/email/auth',
			'POST /v3/userregistration/email/verify',
			'GET /v3/manifest',
		]);
	});

	it('should reject with identifier errors before any request', async () => {
		const transport = new AsyncStubTransport();
		const client = new DysonClient({ region: 'DE', transport, logger: silentLogger });

		await expect(client.beginLogin('+8613800000000')).rejects.toBeInstanceOf(InvalidIdentifierError);
		expect(transport.requests).toHaveLength(0);
	});

	it('should wrap a rejected transport promise', async () => {
		const transport = new AsyncStubTransport([new Error('ECONNRESET')]);
		const client = new DysonClient({ token: 'test-token', transport, logger: silentLogger });

		await expect(client.listDevices()).rejects.toBeInstanceOf(TransportError);
	});

	it('should validate its configuration', () => {
		expect(() => new DysonClient({ region: 'usa', logger: silentLogger })).toThrow(ConfigError);
	});

	it('should report the regional host', () => {
		expect(new DysonClient({ region: 'CN', logger: silentLogger }).apiHost).toBe('https://appapi.cp.dyson.cn');
	});
});

describe('DysonClient default logging', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	const wrongField = encryptCredentials('{"wrongField":"test-device-password"}', 'pkcs7');

	it('should not print decrypted credentials unless debug is enabled', () => {
		const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
		const client = new DysonClient({ transport: new AsyncStubTransport() });

		expect(() => client.decryptLocalCredentials(wrongField, 'AB1-EU-TEST0001')).toThrow(DecryptionError);
		expect(debug).not.toHaveBeenCalled();
	});

	it('should print debug lines with the client prefix when debug is enabled', () => {
		const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
		const client = new DysonClient({ transport: new AsyncStubTransport(), debug: true });

		expect(() => client.decryptLocalCredentials(wrongField, 'AB1-EU-TEST0001')).toThrow(DecryptionError);
		expect(debug).toHaveBeenCalledWith(
			'[dyson-client] Local credentials of %s failed at %s stage; decrypted text=%j',
			'AB1-EU-TEST0001',
			'field-missing',
			'{"wrongField":"test-device-password"}',
		);
	});
});

// ============================================================================
// Blocking front end
// ============================================================================

describe('DysonSyncClient', () => {
	it('should send the same requests and return the same results as DysonClient', async () => {
		const asyncTransport = new AsyncStubTransport(loginReplies());
		const syncTransport = new StubTransport(loginReplies());
		const asyncClient = new DysonClient({ identifier: EMAIL, transport: asyncTransport, logger: silentLogger });
		const syncClient = new DysonSyncClient({ identifier: EMAIL, transport: syncTransport, logger: silentLogger });

		const asyncResults = [
			await asyncClient.provision(),
			(await asyncClient.beginLogin()).challengeId,
			await asyncClient.completeLogin({ otpCode: '123456' }),
			await asyncClient.listDevices(),
		];
		const syncResults = [
			syncClient.provision(),
			syncClient.beginLogin().challengeId,
			syncClient.completeLogin({ otpCode: '123456' }),
			syncClient.listDevices(),
		];

		expect(syncResults).toEqual(asyncResults);
		expect(syncTransport.requests).toEqual(asyncTransport.requests);
		expect(syncClient.authState).toBe(asyncClient.authState);
	});

	it('should keep token import and export in sync with the state', () => {
		const client = new DysonSyncClient({ transport: new StubTransport(), logger: silentLogger });

		client.setToken('test-token');
		expect(client.authState).toBe('authenticated');
		expect(client.getToken()).toEqual({ token: 'test-token', tokenType: 'Bearer', accountId: null });

		client.setToken(null);
		expect(client.authState).toBe('unstarted');
	});
});
