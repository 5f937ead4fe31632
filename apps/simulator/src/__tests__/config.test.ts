import { describe, it, expect } from '@jest/globals';
import { loadSimulatorConfig } from '../config/env.js';

describe('loadSimulatorConfig', () => {
  it('should apply defaults to an empty environment', () => {
    const config = loadSimulatorConfig({});
    expect(config.mqtt).toEqual({ url: 'mqtts://localhost:8883', caPath: undefined, rejectUnauthorized: true });
    expect(config.seed).toBe(42);
    expect(config.backoff).toEqual({ minMs: 1_000, maxMs: 30_000, factor: 2, jitterRatio: 0.25 });
    expect(config.publishIntervalMs).toBeUndefined();
  });

  it('should coerce numeric and boolean variables and treat blanks as unset', () => {
    const config = loadSimulatorConfig({
      MQTT_URL: 'mqtt://broker:1883',
      MQTT_TLS_REJECT_UNAUTHORIZED: 'false',
      PUBLISH_INTERVAL_MS: '5000',
      TOPIC_PREFIX: '',
      CREDENTIAL_SECRET_NAME: 'device-cert',
      BACKOFF_JITTER: '0',
    });
    expect(config.mqtt.url).toBe('mqtt://broker:1883');
    expect(config.mqtt.rejectUnauthorized).toBe(false);
    expect(config.publishIntervalMs).toBe(5_000);
    expect(config.topicPrefix).toBeUndefined();
    expect(config.credentials.secretName).toBe('device-cert');
    expect(config.backoff.jitterRatio).toBe(0);
  });

  it('should reject a minimum backoff above the maximum', () => {
    expect(() => loadSimulatorConfig({ BACKOFF_MIN_MS: '5000', BACKOFF_MAX_MS: '1000' })).toThrow(
      'BACKOFF_MIN_MS must not exceed BACKOFF_MAX_MS',
    );
  });
});
