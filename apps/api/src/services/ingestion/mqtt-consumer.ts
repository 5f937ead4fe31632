import { ExponentialBackoff, MqttTelemetrySubscriber } from '@sensorgrid/adapters';
import {
  telemetryTopicFilter,
  type CredentialProviderPort,
  type TelemetryIngestionPort,
} from '@sensorgrid/domain';

export interface MqttIngestionOptions {
  url: string;
  caPath?: string;
  rejectUnauthorized?: boolean;
  topicPrefix?: string;
  credentials?: CredentialProviderPort;
  clientId?: string;
  backoff?: ExponentialBackoff;
}

/**
 * Subscribes to every telemetry topic and feeds the ingestion router.
 * Returns at once; credential and broker failures are retried in the
 * background until the subscriber is stopped.
 */
export function startMqttIngestion(
  router: TelemetryIngestionPort,
  options: MqttIngestionOptions,
): MqttTelemetrySubscriber {
  const subscriber = new MqttTelemetrySubscriber(
    {
      url: options.url,
      caPath: options.caPath,
      rejectUnauthorized: options.rejectUnauthorized,
      clientId: options.clientId ?? 'sensorgrid-ingest',
      topicFilter: telemetryTopicFilter(options.topicPrefix),
      credentials: options.credentials,
      backoff: options.backoff ?? new ExponentialBackoff({ minMs: 1_000, maxMs: 30_000, jitterRatio: 0.25 }),
    },
    (message) => router.route(message),
  );
  subscriber.start();
  return subscriber;
}
