import { jest, describe, it, expect } from '@jest/globals';
import type { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { AwsSecretsManagerStore, parseCertificateSecret } from '../secrets/aws-secrets-manager.store.js';

describe('parseCertificateSecret', () => {
  it('should accept the snake_case and camelCase key spellings', () => {
    expect(parseCertificateSecret('s', '{"certificate_pem":"C","private_key":"K"}')).toEqual({
      certificate: 'C',
      privateKey: 'K',
    });
    expect(parseCertificateSecret('s', '{"certificate":"C","privateKey":"K"}')).toEqual({
      certificate: 'C',
      privateKey: 'K',
    });
  });

  it('should reject documents without both parts', () => {
    expect(() => parseCertificateSecret('s', '{"certificate":"C"}')).toThrow('secret s lacks a certificate or private key');
    expect(() => parseCertificateSecret('s', 'plain text')).toThrow('secret s is not valid JSON');
    expect(() => parseCertificateSecret('s', '[1]')).toThrow('secret s is not a JSON object');
  });
});

describe('AwsSecretsManagerStore', () => {
  it('should read the named secret string', async () => {
    const send = jest.fn(async (_command: unknown) => ({
      SecretString: '{"certificate_pem":"C","private_key":"K"}',
    }));
    // only `send` is exercised by the store
    const store = new AwsSecretsManagerStore({ client: { send } as unknown as SecretsManagerClient });

    await expect(store.get('device-cert')).resolves.toEqual({ certificate: 'C', privateKey: 'K' });
    const command = send.mock.calls[0]?.[0];
    expect(command instanceof GetSecretValueCommand ? command.input.SecretId : undefined).toBe('device-cert');
  });

  it('should turn client failures into CredentialUnavailable', async () => {
    const send = jest.fn(async (_command: unknown) => {
      throw new Error('AccessDeniedException');
    });
    const store = new AwsSecretsManagerStore({ client: { send } as unknown as SecretsManagerClient });

    await expect(store.get('device-cert')).rejects.toMatchObject({
      kind: 'CredentialUnavailable',
      message: 'secret device-cert: AccessDeniedException',
    });
  });
});
