import 'dotenv/config';
import {
  AwsSecretsManagerStore,
  CredentialResolver,
  MqttTransport,
  credentialOptionsFromSettings,
  hasCredentialSource,
  systemClock,
} from '@sensorgrid/adapters';
import { loadSimulatorConfig } from './config/env.js';
import { loadDeviceCatalogue } from './devices/catalogue.js';
import { SimulatorFleet } from './fleet.js';
import { dropReporter } from './session/drop-reporter.js';

async function main() {
  const config = loadSimulatorConfig();
  const devices = loadDeviceCatalogue(config.devicesFile);

  const secretStore = config.credentials.secretName
    ? new AwsSecretsManagerStore({ region: config.awsRegion })
    : undefined;
  const credentialOptions = credentialOptionsFromSettings(config.credentials, secretStore);
  const credentials = hasCredentialSource(credentialOptions)
    ? new CredentialResolver(credentialOptions)
    : undefined;
  if (!credentials) {
    console.warn('[simulator] no credential source configured; connecting without a client certificate');
  }

  const transport = new MqttTransport({
    url: config.mqtt.url,
    caPath: config.mqtt.caPath,
    rejectUnauthorized: config.mqtt.rejectUnauthorized,
  });

  const controller = new AbortController();
  const fleet = new SimulatorFleet({
    devices,
    transport,
    credentials,
    clock: systemClock,
    seed: config.seed,
    backoff: config.backoff,
    publishIntervalMs: config.publishIntervalMs,
    topicPrefix: config.topicPrefix,
    observerFor: dropReporter,
    signal: controller.signal,
  });
  fleet.start();

  const shutdown = async () => {
    console.log('[simulator] shutting down...');
    controller.abort();
    await fleet.shutdown();
    credentials?.dispose();
    const totals = Object.values(fleet.stats()).reduce(
      (acc, s) => ({
        published: acc.published + s.published,
        dropped: acc.dropped + s.dropped,
        failed: acc.failed + s.failed,
      }),
      { published: 0, dropped: 0, failed: 0 },
    );
    console.log(
      `[simulator] published=${totals.published} dropped=${totals.dropped} failed=${totals.failed}`,
    );
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

main().catch((err) => {
  console.error('[simulator] fatal startup error', err);
  process.exit(1);
});
