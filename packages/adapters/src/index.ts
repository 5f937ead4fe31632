// ─── Time-Series Stores ───────────────────────────────────────────────────────
export { getPool, closePool } from './postgres/pool.js';
export type { DbPool, PoolSettings, Queryable } from './postgres/pool.js';
export { PgTimeSeriesStore, applyTimeSeriesSchema, mapPgError } from './postgres/time-series.store.js';
export { DynamoTimeSeriesStore, mapDynamoError } from './dynamodb/time-series.store.js';
export type { DynamoTimeSeriesStoreOptions } from './dynamodb/time-series.store.js';
export { InMemoryTimeSeriesStore } from './memory/time-series.store.js';

// ─── Credentials & Secrets ────────────────────────────────────────────────────
export {
  CredentialResolver,
  credentialOptionsFromSettings,
  hasCredentialSource,
} from './credentials/credential-resolver.js';
export type { CredentialResolverOptions, CredentialSettings } from './credentials/credential-resolver.js';
export { AwsSecretsManagerStore, parseCertificateSecret } from './secrets/aws-secrets-manager.store.js';

// ─── Transport ────────────────────────────────────────────────────────────────
export { MqttTransport, classifyConnectError } from './mqtt/mqtt-transport.js';
export type { MqttTransportOptions } from './mqtt/mqtt-transport.js';
export { MqttTelemetrySubscriber } from './mqtt/mqtt-subscriber.js';
export type { MqttSubscriberOptions, MessageHandler } from './mqtt/mqtt-subscriber.js';

// ─── Retry ────────────────────────────────────────────────────────────────────
export { ExponentialBackoff } from './retry/backoff.js';
export type { BackoffOptions } from './retry/backoff.js';

// ─── Clock / RNG ──────────────────────────────────────────────────────────────
export {
  DeterministicClock,
  SeededRng,
  deriveSeed,
  systemClock,
} from './clock/deterministic-clock.js';
