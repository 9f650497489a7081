/**
 * Public entry point: the two front ends, the transport boundary and the
 * records and errors they produce.
 */
export { DysonClient } from './dyson/dyson-client.js';
export type { DysonClientBaseOptions, DysonClientOptions } from './dyson/dyson-client.js';
export { DysonSyncClient } from './dyson/dyson-sync-client.js';
export type { DysonSyncClientOptions } from './dyson/dyson-sync-client.js';

export { DysonProtocol } from './dyson/protocol.js';
export type {
	AuthenticationResult,
	AuthState,
	Challenge,
	CompleteLoginParams,
	CompleteMobileLoginParams,
	DysonProtocolOptions,
} from './dyson/protocol.js';
export { runExchange, runExchangeAsync } from './dyson/exchange.js';
export type { Exchange } from './dyson/exchange.js';

export { FetchTransport, buildUrl, parseResponseBody } from './dyson/transport.js';
export type {
	FetchTransportOptions,
	HttpMethod,
	HttpRequest,
	HttpResponse,
	ResponseBody,
	SyncTransport,
	Transport,
} from './dyson/transport.js';

export { resolveConfig, DysonConfigSchema } from './dyson/config.js';
export type { DysonConfig, DysonConfigInput, LocalCredentialsConfig } from './dyson/config.js';
export { consoleLogger, silentLogger } from './dyson/logger.js';
export type { ConsoleLoggerOptions, DysonLogger } from './dyson/logger.js';

export {
	AuthRejectedError,
	AuthUnauthorizedError,
	ConfigError,
	DecryptionError,
	DysonError,
	InvalidIdentifierError,
	InvalidStateError,
	isDysonError,
	ProtocolError,
	TransportError,
} from './dyson/errors.js';
export type { DecryptionStage, DysonErrorCode } from './dyson/errors.js';

export { classifyIdentifier, resolveApiHost, resolveIdentifier } from './dyson/identifier.js';
export type { AccountIdentifier, IdentifierKind } from './dyson/identifier.js';
export { CredentialVault, bearerCredential } from './dyson/credential-vault.js';
export type { BearerCredential } from './dyson/credential-vault.js';
export { supportsLocalBroker } from './dyson/device-catalog.js';
export type {
	ConnectionCategory,
	Device,
	DeviceCategory,
	IotCredentials,
	IotData,
	PendingRelease,
	UserStatus,
} from './dyson/device-catalog.js';
export { LocalCredentialDecryptor } from './dyson/local-credentials.js';
export type { LocalCredentials } from './dyson/local-credentials.js';
export { cloudMqttParameters, localMqttParameters, mqttTopics } from './dyson/mqtt.js';
export type { CloudMqttParameters, LocalMqttParameters, MqttTopics } from './dyson/mqtt.js';
