export type CredentialSource = 'inline' | 'secret-store' | 'file';

/**
 * Transport client certificate and key. Held in process memory only; the
 * buffers are zeroed when the owning resolver is disposed.
 */
export interface Credential {
  readonly certificate: Buffer;
  readonly privateKey: Buffer;
  readonly source: CredentialSource;
  readonly resolvedAt: Date;
}
