import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import {
  CredentialUnavailableError,
  describeError,
  type CertificateSecret,
  type SecretStorePort,
} from '@sensorgrid/domain';

// Accepted key spellings inside the secret's JSON document.
const CERTIFICATE_KEYS = ['certificate_pem', 'certificate', 'certificatePem'];
const PRIVATE_KEY_KEYS = ['private_key', 'privateKey', 'private_key_pem'];

function pick(source: Record<string, unknown>, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'string' && value.length > 0) return value;
  }
  return undefined;
}

export function parseCertificateSecret(name: string, raw: string): CertificateSecret {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new CredentialUnavailableError(`secret ${name} is not valid JSON`);
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new CredentialUnavailableError(`secret ${name} is not a JSON object`);
  }
  const fields: Record<string, unknown> = { ...parsed };
  const certificate = pick(fields, CERTIFICATE_KEYS);
  const privateKey = pick(fields, PRIVATE_KEY_KEYS);
  if (!certificate || !privateKey) {
    throw new CredentialUnavailableError(`secret ${name} lacks a certificate or private key`);
  }
  return { certificate, privateKey };
}

export class AwsSecretsManagerStore implements SecretStorePort {
  private readonly client: SecretsManagerClient;

  constructor(options: { region?: string; client?: SecretsManagerClient } = {}) {
    this.client = options.client ?? new SecretsManagerClient({ region: options.region });
  }

  async get(name: string): Promise<CertificateSecret> {
    let raw: string | undefined;
    try {
      const out = await this.client.send(new GetSecretValueCommand({ SecretId: name }));
      raw = out.SecretString ?? (out.SecretBinary ? Buffer.from(out.SecretBinary).toString('utf8') : undefined);
    } catch (err) {
      throw new CredentialUnavailableError(`secret ${name}: ${describeError(err)}`, { cause: err });
    }
    if (!raw) throw new CredentialUnavailableError(`secret ${name} has no value`);
    return parseCertificateSecret(name, raw);
  }
}
