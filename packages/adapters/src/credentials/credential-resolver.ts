import { readFile } from 'node:fs/promises';
import {
  CredentialUnavailableError,
  describeError,
  type ClockPort,
  type Credential,
  type CredentialProviderPort,
  type CredentialSource,
  type SecretStorePort,
} from '@sensorgrid/domain';
import { systemClock } from '../clock/deterministic-clock.js';

export interface CredentialResolverOptions {
  inline?: { certificate: string; privateKey: string };
  secret?: { name: string; store: SecretStorePort };
  files?: { certificatePath: string; privateKeyPath: string };
  /** Re-resolve once a cached credential is older than this. */
  maxAgeMs?: number;
  clock?: ClockPort;
}

/** Flat, environment-shaped description of the credential sources. */
export interface CredentialSettings {
  certificatePem?: string;
  privateKeyPem?: string;
  secretName?: string;
  certificateFile?: string;
  privateKeyFile?: string;
  maxAgeMs?: number;
}

type KeyMaterial = { certificate: Buffer; privateKey: Buffer };

// PEM blocks passed through env files often carry escaped newlines.
function unescapePem(value: string): string {
  return value.includes('\\n') ? value.replace(/\\n/g, '\n') : value;
}

export function credentialOptionsFromSettings(
  settings: CredentialSettings,
  secretStore?: SecretStorePort,
): CredentialResolverOptions {
  const options: CredentialResolverOptions = { maxAgeMs: settings.maxAgeMs };
  if (settings.certificatePem && settings.privateKeyPem) {
    options.inline = {
      certificate: unescapePem(settings.certificatePem),
      privateKey: unescapePem(settings.privateKeyPem),
    };
  }
  if (settings.secretName && secretStore) {
    options.secret = { name: settings.secretName, store: secretStore };
  }
  if (settings.certificateFile && settings.privateKeyFile) {
    options.files = {
      certificatePath: settings.certificateFile,
      privateKeyPath: settings.privateKeyFile,
    };
  }
  return options;
}

/** True when at least one credential source is configured. */
export function hasCredentialSource(options: CredentialResolverOptions): boolean {
  return Boolean(options.inline || options.secret || options.files);
}

/**
 * Resolves the transport credential from inline configuration, the secret
 * store, or files, in that order. The first configured source that yields a
 * credential wins; later sources are only consulted when an earlier one fails.
 *
 * Concurrent callers share a single in-flight resolution, and the cached
 * reference is only replaced by a fully built credential, so `current()` never
 * exposes a partial one. A replaced credential is zeroed as soon as every
 * caller that resolved it has released it.
 */
export class CredentialResolver implements CredentialProviderPort {
  private cached: Credential | null = null;
  private stale = false;
  private inflight: Promise<Credential> | null = null;
  private disposed = false;
  /** Unreleased `resolve()` results per credential. */
  private readonly leases = new Map<Credential, number>();
  /** Replaced but still leased; zeroed on the last release. */
  private readonly retired = new Set<Credential>();
  private readonly clock: ClockPort;

  constructor(private readonly options: CredentialResolverOptions) {
    this.clock = options.clock ?? systemClock;
  }

  /** Last complete credential, possibly stale; null before the first resolve. */
  current(): Credential | null {
    return this.cached;
  }

  resolve(): Promise<Credential> {
    if (this.disposed) {
      return Promise.reject(new CredentialUnavailableError('credential resolver disposed'));
    }
    const cached = this.cached;
    if (cached && !this.stale && !this.isAged(cached)) return Promise.resolve(this.lease(cached));
    if (!this.inflight) {
      this.inflight = this.load()
        .then((credential) => {
          if (this.disposed) {
            zero(credential);
            throw new CredentialUnavailableError('credential resolver disposed');
          }
          this.replace(credential);
          return credential;
        })
        .finally(() => {
          this.inflight = null;
        });
    }
    return this.inflight.then((credential) => {
      if (this.disposed) throw new CredentialUnavailableError('credential resolver disposed');
      return this.lease(credential);
    });
  }

  invalidate(): void {
    if (this.cached) {
      console.warn(`[credentials] invalidated ${this.cached.source} credential`);
    }
    this.stale = true;
  }

  release(credential: Credential): void {
    const count = this.leases.get(credential);
    if (count === undefined) return;
    if (count > 1) {
      this.leases.set(credential, count - 1);
      return;
    }
    this.leases.delete(credential);
    if (this.retired.delete(credential)) zero(credential);
  }

  /** Zeroes the cached credential and every one still held by a caller. */
  dispose(): void {
    this.disposed = true;
    if (this.cached) zero(this.cached);
    for (const credential of this.leases.keys()) zero(credential);
    this.leases.clear();
    this.retired.clear();
    this.cached = null;
  }

  private lease(credential: Credential): Credential {
    this.leases.set(credential, (this.leases.get(credential) ?? 0) + 1);
    return credential;
  }

  private replace(next: Credential): void {
    const previous = this.cached;
    this.cached = next;
    this.stale = false;
    if (!previous || previous === next) return;
    if (this.leases.has(previous)) this.retired.add(previous);
    else zero(previous);
  }

  private isAged(credential: Credential): boolean {
    const { maxAgeMs } = this.options;
    if (maxAgeMs === undefined) return false;
    return this.clock.now().getTime() - credential.resolvedAt.getTime() >= maxAgeMs;
  }

  private async load(): Promise<Credential> {
    const attempts: Array<[CredentialSource, () => Promise<KeyMaterial>]> = [];
    const { inline, secret, files } = this.options;

    if (inline) {
      attempts.push(['inline', async () => fromStrings(inline.certificate, inline.privateKey)]);
    }
    if (secret) {
      attempts.push([
        'secret-store',
        async () => {
          const bundle = await secret.store.get(secret.name);
          return fromStrings(bundle.certificate, bundle.privateKey);
        },
      ]);
    }
    if (files) {
      attempts.push([
        'file',
        async () => {
          const [certificate, privateKey] = await Promise.all([
            readFile(files.certificatePath),
            readFile(files.privateKeyPath),
          ]);
          return { certificate, privateKey };
        },
      ]);
    }

    const failures: string[] = [];
    for (const [source, attempt] of attempts) {
      try {
        const material = await attempt();
        if (material.certificate.length === 0 || material.privateKey.length === 0) {
          zero(material);
          failures.push(`${source}: empty certificate or key`);
          continue;
        }
        console.log(`[credentials] resolved credential from ${source}`);
        return { ...material, source, resolvedAt: this.clock.now() };
      } catch (err) {
        failures.push(`${source}: ${describeError(err)}`);
      }
    }

    throw new CredentialUnavailableError(
      failures.length > 0
        ? `no credential source succeeded (${failures.join('; ')})`
        : 'no credential source configured',
    );
  }
}

function fromStrings(certificate: string, privateKey: string): KeyMaterial {
  return {
    certificate: Buffer.from(certificate, 'utf8'),
    privateKey: Buffer.from(privateKey, 'utf8'),
  };
}

function zero(material: KeyMaterial): void {
  material.certificate.fill(0);
  material.privateKey.fill(0);
}
