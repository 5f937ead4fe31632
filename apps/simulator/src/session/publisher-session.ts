import {
  AuthenticationFailureError,
  buildTelemetryTopic,
  describeError,
  toWireReading,
  type Credential,
  type CredentialProviderPort,
  type Device,
  type MessageTransportPort,
  type Reading,
  type TransportConnection,
} from '@sensorgrid/domain';
import type { ExponentialBackoff } from '@sensorgrid/adapters';
import type { ReadingGenerator } from '../generator/reading-generator.js';

export type SessionState = 'disconnected' | 'connecting' | 'connected' | 'closed';

export interface SessionObserver {
  onStateChange?(state: SessionState, previous: SessionState): void;
  onRetryScheduled?(delayMs: number, cause: Error): void;
  onPublished?(reading: Reading): void;
  onDropped?(reading: Reading, reason: string): void;
}

export interface SessionStats {
  state: SessionState;
  published: number;
  dropped: number;
  /** Failed connection attempts plus failed publishes. */
  failed: number;
}

export interface PublisherSessionOptions {
  device: Device;
  generator: ReadingGenerator;
  transport: MessageTransportPort;
  /** Omitted when the broker needs no client certificate. */
  credentials?: CredentialProviderPort;
  backoff: ExponentialBackoff;
  /** Delay before each reading; called once per tick. */
  nextIntervalMs: () => number;
  topicPrefix?: string;
  observer?: SessionObserver;
  signal?: AbortSignal;
}

/**
 * One device's connection to the broker.
 *
 * Readings are produced on the device's cadence whatever the connection state and
 * published at most once: a reading generated while disconnected, or whose
 * publish fails, is dropped and counted. Connection failures are retried with
 * the session's backoff until `shutdown()`.
 */
export class PublisherSession {
  private state: SessionState = 'disconnected';
  private connection: TransportConnection | null = null;
  /** Held for the life of `connection`. */
  private credential: Credential | undefined;
  private cadenceTimer: ReturnType<typeof setTimeout> | null = null;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  private connectAbort: AbortController | null = null;
  private published = 0;
  private dropped = 0;
  private failed = 0;
  private readonly topic: string;
  private readonly clientId: string;

  constructor(private readonly options: PublisherSessionOptions) {
    const { device, topicPrefix } = options;
    this.topic = buildTelemetryTopic(device.sensorType, device.deviceId, topicPrefix);
    this.clientId = `sensorgrid-${device.deviceId}`;
  }

  get deviceId(): string {
    return this.options.device.deviceId;
  }

  stats(): SessionStats {
    return { state: this.state, published: this.published, dropped: this.dropped, failed: this.failed };
  }

  start(): void {
    if (this.cadenceTimer || this.is('closed')) return;
    const { signal } = this.options;
    if (signal?.aborted) {
      void this.shutdown();
      return;
    }
    signal?.addEventListener('abort', this.onAbort, { once: true });
    this.scheduleTick();
    void this.connect();
  }

  /** Opens a connection when disconnected. Never rejects. */
  async connect(): Promise<void> {
    if (!this.is('disconnected')) return;
    this.clearRetry();
    this.transition('connecting');
    const attempt = new AbortController();
    this.connectAbort = attempt;
    let credential: Credential | undefined;
    try {
      credential = this.options.credentials ? await this.options.credentials.resolve() : undefined;
      if (!this.is('connecting')) {
        this.release(credential);
        return;
      }
      const connection = await this.options.transport.connect({
        clientId: this.clientId,
        credential,
        signal: attempt.signal,
      });
      if (!this.is('connecting')) {
        await this.closeQuietly(connection);
        this.release(credential);
        return;
      }
      this.connection = connection;
      this.credential = credential;
      connection.onLost((err) => this.handleLost(connection, err));
      this.transition('connected');
    } catch (err) {
      this.release(credential);
      if (this.is('connecting')) this.handleConnectFailure(err);
    } finally {
      if (this.connectAbort === attempt) this.connectAbort = null;
    }
  }

  /** Stops publishing and closes the transport. Never rejects. */
  async shutdown(): Promise<void> {
    if (this.is('closed')) return;
    if (this.cadenceTimer) clearTimeout(this.cadenceTimer);
    this.cadenceTimer = null;
    this.clearRetry();
    this.connectAbort?.abort();
    this.options.signal?.removeEventListener('abort', this.onAbort);
    const connection = this.connection;
    const credential = this.credential;
    this.connection = null;
    this.credential = undefined;
    this.transition('closed');
    if (connection) await this.closeQuietly(connection);
    this.release(credential);
  }

  /** Generates and publishes one reading. */
  async tick(): Promise<void> {
    if (this.is('closed')) return;
    const reading = this.options.generator.next(this.options.device);
    const connection = this.connection;
    if (!connection || !this.is('connected')) {
      this.drop(reading, 'not connected');
      return;
    }
    try {
      await connection.publish(this.topic, JSON.stringify(toWireReading(reading)));
      this.published += 1;
      this.options.backoff.reset();
      this.options.observer?.onPublished?.(reading);
    } catch (err) {
      this.failed += 1;
      this.drop(reading, describeError(err));
      this.handleLost(connection, err);
    }
  }

  private scheduleTick(): void {
    this.cadenceTimer = setTimeout(() => {
      this.scheduleTick();
      void this.tick();
    }, this.options.nextIntervalMs());
  }

  private readonly onAbort = (): void => {
    void this.shutdown();
  };

  private is(state: SessionState): boolean {
    return this.state === state;
  }

  private transition(next: SessionState): void {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;
    console.log(`[publisher-session] ${this.deviceId} ${previous} -> ${next}`);
    this.options.observer?.onStateChange?.(next, previous);
  }

  private drop(reading: Reading, reason: string): void {
    this.dropped += 1;
    this.options.observer?.onDropped?.(reading, reason);
  }

  private handleConnectFailure(err: unknown): void {
    const error = err instanceof Error ? err : new Error(String(err));
    this.failed += 1;
    if (error instanceof AuthenticationFailureError) {
      this.options.credentials?.invalidate();
    }
    this.transition('disconnected');
    this.scheduleRetry(error);
  }

  private handleLost(connection: TransportConnection, err: unknown): void {
    if (this.connection !== connection || !this.is('connected')) return;
    const credential = this.credential;
    this.connection = null;
    this.credential = undefined;
    this.transition('disconnected');
    void this.closeQuietly(connection).then(() => this.release(credential));
    this.scheduleRetry(err instanceof Error ? err : new Error(String(err)));
  }

  private release(credential: Credential | undefined): void {
    if (credential) this.options.credentials?.release(credential);
  }

  private scheduleRetry(cause: Error): void {
    this.clearRetry();
    const delayMs = this.options.backoff.next();
    console.warn(`[publisher-session] ${this.deviceId} ${cause.message}; retrying in ${delayMs}ms`);
    this.options.observer?.onRetryScheduled?.(delayMs, cause);
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      void this.connect();
    }, delayMs);
  }

  private clearRetry(): void {
    if (this.retryTimer) clearTimeout(this.retryTimer);
    this.retryTimer = null;
  }

  private async closeQuietly(connection: TransportConnection): Promise<void> {
    try {
      await connection.close();
    } catch (err) {
      console.warn(`[publisher-session] ${this.deviceId} close failed: ${describeError(err)}`);
    }
  }
}
