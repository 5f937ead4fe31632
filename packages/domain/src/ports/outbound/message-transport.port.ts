import type { Credential } from '../../entities/credential.js';

export interface TransportConnectOptions {
  clientId: string;
  credential?: Credential;
  signal?: AbortSignal;
}

export interface TransportConnection {
  /** Resolves once the broker acknowledges the message. */
  publish(topic: string, payload: string): Promise<void>;
  /** Registers a listener for loss of an established connection. */
  onLost(listener: (err: Error) => void): void;
  close(): Promise<void>;
}

/**
 * Opens independent transport connections. Rejects with
 * AuthenticationFailureError when the broker refuses the credential and
 * TransportFailureError for anything else.
 */
export interface MessageTransportPort {
  connect(options: TransportConnectOptions): Promise<TransportConnection>;
}
