export interface CertificateSecret {
  certificate: string;
  privateKey: string;
}

export interface SecretStorePort {
  /** Fetches a named certificate/key bundle. One network call per invocation. */
  get(name: string): Promise<CertificateSecret>;
}
