import { connect, type IClientOptions, type MqttClient } from 'mqtt';
import {
  AuthenticationFailureError,
  TransportFailureError,
  describeError,
  type MessageTransportPort,
  type TransportConnectOptions,
  type TransportConnection,
} from '@sensorgrid/domain';
import { loadCaBundle } from './tls.js';

export interface MqttTransportOptions {
  url: string;
  /** CA bundle used to verify the broker. */
  caPath?: string;
  rejectUnauthorized?: boolean;
  connectTimeoutMs?: number;
  username?: string;
  password?: string;
}

// CONNACK codes that mean the broker refused who we are:
// v3.1.1 4/5, v5 134/135/138/140.
const AUTH_REFUSED_CODES = new Set([4, 5, 134, 135, 138, 140]);

function reasonCode(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const code = err.code;
    return typeof code === 'number' ? code : undefined;
  }
  return undefined;
}

export function classifyConnectError(err: unknown): Error {
  const code = reasonCode(err);
  if (code !== undefined && AUTH_REFUSED_CODES.has(code)) {
    return new AuthenticationFailureError(`broker refused credentials (code ${code})`, { cause: err });
  }
  return new TransportFailureError(`connect failed: ${describeError(err)}`, { cause: err });
}

/**
 * MQTT over (mutual) TLS. Every `connect()` opens its own client with
 * automatic reconnects disabled; retry policy belongs to the caller.
 */
export class MqttTransport implements MessageTransportPort {
  private readonly ca: Buffer | undefined;

  constructor(private readonly options: MqttTransportOptions) {
    this.ca = loadCaBundle(options.url, options.caPath, 'mqtt-transport');
  }

  connect({ clientId, credential, signal }: TransportConnectOptions): Promise<TransportConnection> {
    const clientOptions: IClientOptions = {
      clientId,
      clean: true,
      reconnectPeriod: 0,
      connectTimeout: this.options.connectTimeoutMs ?? 10_000,
      username: this.options.username,
      password: this.options.password,
      ca: this.ca,
      cert: credential?.certificate,
      key: credential?.privateKey,
      rejectUnauthorized: this.options.rejectUnauthorized ?? true,
    };

    return new Promise<TransportConnection>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new TransportFailureError('connect aborted'));
        return;
      }
      const client = connect(this.options.url, clientOptions);

      const cleanup = () => {
        client.removeListener('connect', onConnect);
        client.removeListener('error', onError);
        client.removeListener('close', onClose);
        signal?.removeEventListener('abort', onAbort);
      };
      const fail = (err: Error) => {
        cleanup();
        client.on('error', (late) => {
          console.warn(`[mqtt-transport] ${clientId} error after failed connect: ${late.message}`);
        });
        client.end(true);
        reject(err);
      };
      const onConnect = () => {
        cleanup();
        resolve(new MqttConnection(client));
      };
      const onError = (err: Error) => fail(classifyConnectError(err));
      const onClose = () => fail(new TransportFailureError('connection closed before CONNACK'));
      const onAbort = () => fail(new TransportFailureError('connect aborted'));

      client.on('connect', onConnect);
      client.on('error', onError);
      client.on('close', onClose);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

class MqttConnection implements TransportConnection {
  private closing = false;
  private lost = false;
  private readonly listeners: Array<(err: Error) => void> = [];

  constructor(private readonly client: MqttClient) {
    client.on('error', (err) => this.markLost(new TransportFailureError(describeError(err), { cause: err })));
    client.on('close', () => this.markLost(new TransportFailureError('connection closed')));
  }

  publish(topic: string, payload: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.closing || this.lost || !this.client.connected) {
        reject(new TransportFailureError('not connected'));
        return;
      }
      this.client.publish(topic, payload, { qos: 1 }, (err) => {
        if (err) reject(new TransportFailureError(`publish failed: ${err.message}`, { cause: err }));
        else resolve();
      });
    });
  }

  onLost(listener: (err: Error) => void): void {
    this.listeners.push(listener);
  }

  close(): Promise<void> {
    this.closing = true;
    return new Promise((resolve) => {
      this.client.end(false, {}, () => resolve());
    });
  }

  private markLost(err: Error): void {
    if (this.closing || this.lost) return;
    this.lost = true;
    for (const listener of this.listeners) listener(err);
  }
}
