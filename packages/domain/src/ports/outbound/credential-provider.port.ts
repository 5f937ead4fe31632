import type { Credential } from '../../entities/credential.js';

/**
 * Every credential returned by `resolve()` is held by the caller until it
 * hands it back with `release()`; the provider may zero it after that.
 */
export interface CredentialProviderPort {
  resolve(): Promise<Credential>;
  /** Drops the cached credential so the next `resolve()` goes back to the sources. */
  invalidate(): void;
  release(credential: Credential): void;
}
