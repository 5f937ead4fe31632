// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/device.js';
export * from './entities/reading.js';
export * from './entities/storage-record.js';
export * from './entities/credential.js';

// ─── Errors & helpers ─────────────────────────────────────────────────────────
export * from './errors.js';
export * from './topics.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/telemetry-query.port.js';
export * from './ports/inbound/telemetry-ingestion.port.js';
export * from './ports/inbound/access-gate.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/time-series-store.port.js';
export * from './ports/outbound/secret-store.port.js';
export * from './ports/outbound/credential-provider.port.js';
export * from './ports/outbound/message-transport.port.js';
export * from './ports/outbound/clock.port.js';
export * from './ports/outbound/stream-publisher.port.js';
