import { z } from 'zod';

const optionalString = z.preprocess((v) => (v === '' ? undefined : v), z.string().optional());
const optionalInt = z.preprocess((v) => (v === '' ? undefined : v), z.coerce.number().int().positive().optional());

const booleanFlag = (fallback: boolean) =>
  z.preprocess(
    (v) => (v === '' || v === undefined ? fallback : String(v).toLowerCase() === 'true' || v === '1'),
    z.boolean(),
  );

const apiEnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3001),
    CORS_ORIGIN: z.string().default('*'),
    STORE_DRIVER: z.enum(['postgres', 'dynamodb', 'memory']).default('postgres'),
    DATABASE_URL: optionalString,
    TABLE_NAME: z.string().default('sensor_readings'),
    DEVICE_INDEX_NAME: z.string().default('device_id-sort_key-index'),
    AWS_REGION: z.string().default('us-east-1'),
    RETENTION_SECONDS: z.coerce.number().int().positive().default(30 * 24 * 60 * 60),
    QUERY_PAGE_SIZE: z.coerce.number().int().positive().max(1_000).default(500),
    QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    PURGE_INTERVAL_MS: z.coerce.number().int().nonnegative().default(60 * 60 * 1000),
    INGEST_MQTT_ENABLED: booleanFlag(false),
    MQTT_URL: z.string().url().default('mqtts://localhost:8883'),
    MQTT_TLS_CA: optionalString,
    MQTT_TLS_REJECT_UNAUTHORIZED: booleanFlag(true),
    TOPIC_PREFIX: optionalString,
    CREDENTIAL_CERT_PEM: optionalString,
    CREDENTIAL_KEY_PEM: optionalString,
    CREDENTIAL_SECRET_NAME: optionalString,
    CREDENTIAL_CERT_FILE: optionalString,
    CREDENTIAL_KEY_FILE: optionalString,
    CREDENTIAL_MAX_AGE_MS: optionalInt,
    ACCESS_USERNAME: optionalString,
    ACCESS_PASSWORD_HASH: optionalString,
    ACCESS_GATE_DISABLED: booleanFlag(false),
  })
  .refine((env) => env.STORE_DRIVER !== 'postgres' || env.DATABASE_URL !== undefined, {
    message: 'DATABASE_URL is required when STORE_DRIVER=postgres',
    path: ['DATABASE_URL'],
  })
  .refine((env) => (env.ACCESS_USERNAME === undefined) === (env.ACCESS_PASSWORD_HASH === undefined), {
    message: 'ACCESS_USERNAME and ACCESS_PASSWORD_HASH must be set together',
    path: ['ACCESS_PASSWORD_HASH'],
  })
  .refine(
    (env) => env.ACCESS_GATE_DISABLED || env.ACCESS_USERNAME !== undefined || env.ACCESS_PASSWORD_HASH !== undefined,
    {
      message: 'ACCESS_USERNAME and ACCESS_PASSWORD_HASH are required unless ACCESS_GATE_DISABLED=true',
      path: ['ACCESS_USERNAME'],
    },
  );

export type StoreDriver = 'postgres' | 'dynamodb' | 'memory';

export interface ApiConfig {
  port: number;
  corsOrigin: string;
  store: {
    driver: StoreDriver;
    databaseUrl?: string;
    tableName: string;
    deviceIndexName: string;
    region: string;
  };
  retentionSeconds: number;
  query: { pageSize: number; timeoutMs: number };
  purgeIntervalMs: number;
  ingest: {
    mqttEnabled: boolean;
    mqttUrl: string;
    caPath?: string;
    rejectUnauthorized: boolean;
    topicPrefix?: string;
  };
  credentials: {
    certificatePem?: string;
    privateKeyPem?: string;
    secretName?: string;
    certificateFile?: string;
    privateKeyFile?: string;
    maxAgeMs?: number;
  };
  /** Absent exactly when `accessGateDisabled` is set. */
  access?: { username: string; passwordHash: string };
  accessGateDisabled: boolean;
}

export function loadApiConfig(source: NodeJS.ProcessEnv = process.env): Readonly<ApiConfig> {
  const env = apiEnvSchema.parse(source);
  return Object.freeze({
    port: env.PORT,
    corsOrigin: env.CORS_ORIGIN,
    store: {
      driver: env.STORE_DRIVER,
      databaseUrl: env.DATABASE_URL,
      tableName: env.TABLE_NAME,
      deviceIndexName: env.DEVICE_INDEX_NAME,
      region: env.AWS_REGION,
    },
    retentionSeconds: env.RETENTION_SECONDS,
    query: { pageSize: env.QUERY_PAGE_SIZE, timeoutMs: env.QUERY_TIMEOUT_MS },
    purgeIntervalMs: env.PURGE_INTERVAL_MS,
    ingest: {
      mqttEnabled: env.INGEST_MQTT_ENABLED,
      mqttUrl: env.MQTT_URL,
      caPath: env.MQTT_TLS_CA,
      rejectUnauthorized: env.MQTT_TLS_REJECT_UNAUTHORIZED,
      topicPrefix: env.TOPIC_PREFIX,
    },
    credentials: {
      certificatePem: env.CREDENTIAL_CERT_PEM,
      privateKeyPem: env.CREDENTIAL_KEY_PEM,
      secretName: env.CREDENTIAL_SECRET_NAME,
      certificateFile: env.CREDENTIAL_CERT_FILE,
      privateKeyFile: env.CREDENTIAL_KEY_FILE,
      maxAgeMs: env.CREDENTIAL_MAX_AGE_MS,
    },
    access:
      !env.ACCESS_GATE_DISABLED && env.ACCESS_USERNAME !== undefined && env.ACCESS_PASSWORD_HASH !== undefined
        ? { username: env.ACCESS_USERNAME, passwordHash: env.ACCESS_PASSWORD_HASH }
        : undefined,
    accessGateDisabled: env.ACCESS_GATE_DISABLED,
  });
}
