import { connect, type MqttClient } from 'mqtt';
import {
  AuthenticationFailureError,
  describeError,
  type Credential,
  type CredentialProviderPort,
  type InboundMessage,
} from '@sensorgrid/domain';
import { ExponentialBackoff } from '../retry/backoff.js';
import { classifyConnectError, type MqttTransportOptions } from './mqtt-transport.js';
import { loadCaBundle } from './tls.js';

export interface MqttSubscriberOptions extends MqttTransportOptions {
  clientId: string;
  topicFilter: string;
  /** Resolved before every connect; omitted when the broker needs no client certificate. */
  credentials?: CredentialProviderPort;
  /** Delay before reopening after a credential or authentication failure. */
  backoff?: ExponentialBackoff;
  reconnectPeriodMs?: number;
}

export type MessageHandler = (message: InboundMessage) => Promise<unknown>;

/**
 * Long-lived QoS 1 subscription feeding each message to a handler.
 * Unlike the publishing transport, the client's own reconnect loop is kept
 * for network failures and subscriptions are renewed on every (re)connect.
 * A missing credential or a broker refusing the one presented is retried
 * with backoff through a fresh client until `stop()`.
 */
export class MqttTelemetrySubscriber {
  private client: MqttClient | null = null;
  /** Held for the life of `client`. */
  private credential: Credential | undefined;
  private running = false;
  private epoch = 0;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly backoff: ExponentialBackoff;
  private readonly ca: Buffer | undefined;

  constructor(
    private readonly options: MqttSubscriberOptions,
    private readonly handler: MessageHandler,
  ) {
    this.backoff =
      options.backoff ?? new ExponentialBackoff({ minMs: 1_000, maxMs: 30_000, jitterRatio: 0.25 });
    this.ca = loadCaBundle(options.url, options.caPath, 'mqtt-subscriber');
  }

  get connected(): boolean {
    return this.client?.connected ?? false;
  }

  /** Opens the subscription in the background. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.epoch += 1;
    void this.open(this.epoch);
  }

  stop(): Promise<void> {
    this.running = false;
    this.clearRetry();
    const client = this.client;
    this.client = null;
    if (!client) {
      this.releaseCredential();
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      client.end(false, {}, () => {
        this.releaseCredential();
        resolve();
      });
    });
  }

  private isCurrent(epoch: number): boolean {
    return this.running && this.epoch === epoch;
  }

  private async open(epoch: number): Promise<void> {
    let credential: Credential | undefined;
    try {
      credential = this.options.credentials ? await this.options.credentials.resolve() : undefined;
    } catch (err) {
      this.retryLater(epoch, err);
      return;
    }
    if (!this.isCurrent(epoch)) {
      if (credential) this.options.credentials?.release(credential);
      return;
    }
    try {
      this.client = this.connectWith(credential);
      this.credential = credential;
    } catch (err) {
      if (credential) this.options.credentials?.release(credential);
      this.retryLater(epoch, err);
    }
  }

  private connectWith(credential: Credential | undefined): MqttClient {
    const { options } = this;
    const client = connect(options.url, {
      clientId: options.clientId,
      clean: false,
      reconnectPeriod: options.reconnectPeriodMs ?? 5_000,
      connectTimeout: options.connectTimeoutMs ?? 10_000,
      username: options.username,
      password: options.password,
      ca: this.ca,
      cert: credential?.certificate,
      key: credential?.privateKey,
      rejectUnauthorized: options.rejectUnauthorized ?? true,
    });

    client.on('connect', () => {
      if (this.client !== client) return;
      this.backoff.reset();
      client.subscribe(options.topicFilter, { qos: 1 }, (err) => {
        if (err) {
          console.error(`[mqtt-subscriber] subscribe ${options.topicFilter} failed: ${err.message}`);
          return;
        }
        console.log(`[mqtt-subscriber] subscribed to ${options.topicFilter}`);
      });
    });
    client.on('message', (topic, payload) => {
      this.handler({ topic, payload }).catch((err: unknown) => {
        console.error(`[mqtt-subscriber] handler failed for ${topic}: ${describeError(err)}`);
      });
    });
    client.on('error', (err) => this.handleError(client, err));
    client.on('offline', () => {
      if (this.client === client) console.warn('[mqtt-subscriber] offline, reconnecting');
    });
    return client;
  }

  private handleError(client: MqttClient, err: unknown): void {
    if (this.client !== client) return;
    const error = classifyConnectError(err);
    if (!(error instanceof AuthenticationFailureError)) {
      console.warn(`[mqtt-subscriber] ${describeError(error)}`);
      return;
    }
    // The client's own reconnect loop would keep presenting the refused credential.
    this.client = null;
    client.end(true);
    this.options.credentials?.invalidate();
    this.releaseCredential();
    this.retryLater(this.epoch, error);
  }

  private retryLater(epoch: number, cause: unknown): void {
    if (!this.isCurrent(epoch)) return;
    this.clearRetry();
    const delayMs = this.backoff.next();
    console.warn(`[mqtt-subscriber] ${describeError(cause)}; retrying in ${delayMs}ms`);
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      void this.open(epoch);
    }, delayMs);
  }

  private clearRetry(): void {
    if (this.retryTimer) clearTimeout(this.retryTimer);
    this.retryTimer = null;
  }

  private releaseCredential(): void {
    const credential = this.credential;
    this.credential = undefined;
    if (credential) this.options.credentials?.release(credential);
  }
}
