import { z } from 'zod';

// Blank entries in an env file mean "unset".
const optionalString = z.preprocess((v) => (v === '' ? undefined : v), z.string().optional());
const optionalInt = z.preprocess((v) => (v === '' ? undefined : v), z.coerce.number().int().positive().optional());

const booleanFlag = (fallback: boolean) =>
  z.preprocess(
    (v) => (v === '' || v === undefined ? fallback : String(v).toLowerCase() === 'true' || v === '1'),
    z.boolean(),
  );

const simulatorEnvSchema = z
  .object({
    MQTT_URL: z.string().url().default('mqtts://localhost:8883'),
    MQTT_TLS_CA: optionalString,
    MQTT_TLS_REJECT_UNAUTHORIZED: booleanFlag(true),
    TOPIC_PREFIX: optionalString,
    DEVICES_FILE: optionalString,
    PUBLISH_INTERVAL_MS: optionalInt,
    SIMULATOR_SEED: z.coerce.number().int().default(42),
    CREDENTIAL_CERT_PEM: optionalString,
    CREDENTIAL_KEY_PEM: optionalString,
    CREDENTIAL_SECRET_NAME: optionalString,
    AWS_REGION: z.string().default('us-east-1'),
    CREDENTIAL_CERT_FILE: optionalString,
    CREDENTIAL_KEY_FILE: optionalString,
    CREDENTIAL_MAX_AGE_MS: optionalInt,
    BACKOFF_MIN_MS: z.coerce.number().int().positive().default(1_000),
    BACKOFF_MAX_MS: z.coerce.number().int().positive().default(30_000),
    BACKOFF_FACTOR: z.coerce.number().min(1).default(2),
    BACKOFF_JITTER: z.coerce.number().min(0).max(1).default(0.25),
  })
  .refine((env) => env.BACKOFF_MIN_MS <= env.BACKOFF_MAX_MS, {
    message: 'BACKOFF_MIN_MS must not exceed BACKOFF_MAX_MS',
    path: ['BACKOFF_MIN_MS'],
  });

export interface SimulatorConfig {
  mqtt: { url: string; caPath?: string; rejectUnauthorized: boolean };
  topicPrefix?: string;
  devicesFile?: string;
  publishIntervalMs?: number;
  seed: number;
  awsRegion: string;
  credentials: {
    certificatePem?: string;
    privateKeyPem?: string;
    secretName?: string;
    certificateFile?: string;
    privateKeyFile?: string;
    maxAgeMs?: number;
  };
  backoff: { minMs: number; maxMs: number; factor: number; jitterRatio: number };
}

export function loadSimulatorConfig(source: NodeJS.ProcessEnv = process.env): Readonly<SimulatorConfig> {
  const env = simulatorEnvSchema.parse(source);
  return Object.freeze({
    mqtt: {
      url: env.MQTT_URL,
      caPath: env.MQTT_TLS_CA,
      rejectUnauthorized: env.MQTT_TLS_REJECT_UNAUTHORIZED,
    },
    topicPrefix: env.TOPIC_PREFIX,
    devicesFile: env.DEVICES_FILE,
    publishIntervalMs: env.PUBLISH_INTERVAL_MS,
    seed: env.SIMULATOR_SEED,
    awsRegion: env.AWS_REGION,
    credentials: {
      certificatePem: env.CREDENTIAL_CERT_PEM,
      privateKeyPem: env.CREDENTIAL_KEY_PEM,
      secretName: env.CREDENTIAL_SECRET_NAME,
      certificateFile: env.CREDENTIAL_CERT_FILE,
      privateKeyFile: env.CREDENTIAL_KEY_FILE,
      maxAgeMs: env.CREDENTIAL_MAX_AGE_MS,
    },
    backoff: {
      minMs: env.BACKOFF_MIN_MS,
      maxMs: env.BACKOFF_MAX_MS,
      factor: env.BACKOFF_FACTOR,
      jitterRatio: env.BACKOFF_JITTER,
    },
  });
}
