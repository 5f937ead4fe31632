import 'dotenv/config';
import { createServer } from 'http';
import {
  AwsSecretsManagerStore,
  CredentialResolver,
  DynamoTimeSeriesStore,
  InMemoryTimeSeriesStore,
  PgTimeSeriesStore,
  applyTimeSeriesSchema,
  closePool,
  credentialOptionsFromSettings,
  getPool,
  hasCredentialSource,
  type MqttTelemetrySubscriber,
} from '@sensorgrid/adapters';
import type { TimeSeriesStorePort } from '@sensorgrid/domain';
import { buildApp } from './app.js';
import { loadApiConfig, type ApiConfig } from './config/env.js';
import { BcryptAccessGate } from './services/auth/access-gate.js';
import { IngestionRouter } from './services/ingestion/ingestion-router.js';
import { startMqttIngestion } from './services/ingestion/mqtt-consumer.js';
import { QueryEngine } from './services/query/query-engine.js';
import { RetentionSweeper, isPurgeable } from './services/retention/retention-sweeper.js';
import { WsGateway } from './ws/ws-gateway.js';

async function createStore(config: Readonly<ApiConfig>): Promise<TimeSeriesStorePort> {
  switch (config.store.driver) {
    case 'postgres': {
      const pool = getPool({
        connectionString: config.store.databaseUrl,
        statementTimeoutMs: config.query.timeoutMs,
        applicationName: 'sensorgrid-api',
      });
      await pool.query('SELECT 1');
      console.log('[server] database connected');
      await applyTimeSeriesSchema(pool);
      return new PgTimeSeriesStore(pool);
    }
    case 'dynamodb':
      return new DynamoTimeSeriesStore({
        tableName: config.store.tableName,
        deviceIndexName: config.store.deviceIndexName,
        region: config.store.region,
      });
    case 'memory':
      console.warn('[server] using the in-memory store; data is lost on restart');
      return new InMemoryTimeSeriesStore();
  }
}

async function main() {
  const config = loadApiConfig();
  const store = await createStore(config);

  const accessGate = config.access ? new BcryptAccessGate(config.access) : undefined;
  if (!accessGate) console.warn('[server] ACCESS_GATE_DISABLED=true; query API is unauthenticated');

  const httpServer = createServer();
  const wsGateway = new WsGateway(httpServer, { gate: accessGate });

  const ingestion = new IngestionRouter({
    store,
    retentionSeconds: config.retentionSeconds,
    topicPrefix: config.ingest.topicPrefix,
    streamPublisher: wsGateway,
  });
  const queryEngine = new QueryEngine({
    store,
    pageSize: config.query.pageSize,
    defaultTimeoutMs: config.query.timeoutMs,
  });

  const app = buildApp({
    queryEngine,
    ingestion,
    accessGate,
    corsOrigin: config.corsOrigin,
    storeDriver: config.store.driver,
  });
  httpServer.on('request', app);

  const sweeper = isPurgeable(store) ? new RetentionSweeper(store, config.purgeIntervalMs) : null;
  sweeper?.start();

  let credentials: CredentialResolver | undefined;
  let subscriber: MqttTelemetrySubscriber | undefined;
  if (config.ingest.mqttEnabled) {
    const secretStore = config.credentials.secretName
      ? new AwsSecretsManagerStore({ region: config.store.region })
      : undefined;
    const credentialOptions = credentialOptionsFromSettings(config.credentials, secretStore);
    credentials = hasCredentialSource(credentialOptions) ? new CredentialResolver(credentialOptions) : undefined;
    subscriber = startMqttIngestion(ingestion, {
      url: config.ingest.mqttUrl,
      caPath: config.ingest.caPath,
      rejectUnauthorized: config.ingest.rejectUnauthorized,
      topicPrefix: config.ingest.topicPrefix,
      credentials,
    });
  }

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    sweeper?.stop();
    await subscriber?.stop();
    await ingestion.drain();
    await wsGateway.close();
    httpServer.close();
    credentials?.dispose();
    if (config.store.driver === 'postgres') await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown error', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
