/**
 * Publisher session state machine over a fake transport, on fake timers.
 */

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { DeterministicClock, ExponentialBackoff, SeededRng } from '@sensorgrid/adapters';
import {
  AuthenticationFailureError,
  CredentialUnavailableError,
  TransportFailureError,
  type Credential,
  type CredentialProviderPort,
  type MessageTransportPort,
  type Reading,
  type TransportConnectOptions,
  type TransportConnection,
} from '@sensorgrid/domain';
import { ReadingGenerator } from '../generator/reading-generator.js';
import { PublisherSession, type SessionState } from '../session/publisher-session.js';

// ─── Fakes ────────────────────────────────────────────────────────────────────

class FakeConnection implements TransportConnection {
  readonly published: Array<[string, string]> = [];
  failNext: Error | null = null;
  closed = false;
  private readonly listeners: Array<(err: Error) => void> = [];

  async publish(topic: string, payload: string): Promise<void> {
    const failure = this.failNext;
    this.failNext = null;
    if (failure) throw failure;
    this.published.push([topic, payload]);
  }

  onLost(listener: (err: Error) => void): void {
    this.listeners.push(listener);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  lose(err: Error): void {
    for (const listener of this.listeners) listener(err);
  }
}

class FakeTransport implements MessageTransportPort {
  readonly calls: TransportConnectOptions[] = [];
  readonly connections: FakeConnection[] = [];
  /** Consumed one per connect; an empty queue means success. */
  readonly failures: Error[] = [];
  hold: Promise<void> | null = null;

  async connect(options: TransportConnectOptions): Promise<TransportConnection> {
    this.calls.push(options);
    if (this.hold) await this.hold;
    const failure = this.failures.shift();
    if (failure) throw failure;
    const connection = new FakeConnection();
    this.connections.push(connection);
    return connection;
  }
}

const credential: Credential = {
  certificate: Buffer.from('test-cert'),
  privateKey: Buffer.from('test-key'),
  source: 'inline',
  resolvedAt: new Date(0),
};

async function flush(): Promise<void> {
  for (let i = 0; i < 20; i += 1) await Promise.resolve();
}

// ─── Setup ────────────────────────────────────────────────────────────────────

interface Harness {
  session: PublisherSession;
  transport: FakeTransport;
  backoff: ExponentialBackoff;
  states: SessionState[];
  retries: number[];
  dropped: Array<[Reading, string]>;
}

interface BuildOptions {
  credentials?: CredentialProviderPort;
  signal?: AbortSignal;
  nextIntervalMs?: () => number;
}

function build(options: BuildOptions = {}): Harness {
  const transport = new FakeTransport();
  const backoff = new ExponentialBackoff({ minMs: 1_000, maxMs: 8_000, factor: 2 });
  const states: SessionState[] = [];
  const retries: number[] = [];
  const dropped: Array<[Reading, string]> = [];
  const session = new PublisherSession({
    device: { deviceId: 'unit_1_hvac', sensorType: 'hvac' },
    generator: new ReadingGenerator({
      rng: new SeededRng(1),
      clock: new DeterministicClock(Date.UTC(2024, 0, 1), 60_000),
    }),
    transport,
    credentials: options.credentials,
    backoff,
    nextIntervalMs: options.nextIntervalMs ?? (() => 60_000),
    topicPrefix: 'site-a',
    signal: options.signal,
    observer: {
      onStateChange: (state) => states.push(state),
      onRetryScheduled: (delayMs) => retries.push(delayMs),
      onDropped: (reading, reason) => dropped.push([reading, reason]),
    },
  });
  return { session, transport, backoff, states, retries, dropped };
}

describe('PublisherSession', () => {
  beforeEach(() => {
    jest.useFakeTimers();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  it('should connect on start and publish one wire reading per cadence tick', async () => {
    const { session, transport, states } = build();
    session.start();
    await flush();

    expect(states).toEqual(['connecting', 'connected']);
    expect(transport.calls[0]?.clientId).toBe('sensorgrid-unit_1_hvac');

    jest.advanceTimersByTime(60_000);
    await flush();

    const published = transport.connections[0]?.published ?? [];
    expect(published).toHaveLength(1);
    const [topic, payload] = published[0] ?? ['', '{}'];
    expect(topic).toBe('site-a/hvac/unit_1_hvac');
    expect(JSON.parse(payload)).toMatchObject({
      device_id: 'unit_1_hvac',
      sensor_type: 'hvac',
      timestamp: '2024-01-01T00:00:00Z',
      schema_version: 1,
    });
    expect(session.stats()).toEqual({ state: 'connected', published: 1, dropped: 0, failed: 0 });

    await session.shutdown();
  });

  it('should drop and count readings produced while disconnected', async () => {
    const { session, dropped } = build();
    await session.tick();
    expect(session.stats()).toEqual({ state: 'disconnected', published: 0, dropped: 1, failed: 0 });
    expect(dropped[0]?.[1]).toBe('not connected');
  });

  it('should back off with non-decreasing delays and reset after a successful publish', async () => {
    const { session, transport, backoff, retries, states } = build();
    transport.failures.push(
      new TransportFailureError('refused'),
      new TransportFailureError('refused'),
      new TransportFailureError('refused'),
    );

    await session.connect();
    jest.advanceTimersByTime(1_000);
    await flush();
    jest.advanceTimersByTime(2_000);
    await flush();
    jest.advanceTimersByTime(4_000);
    await flush();

    expect(retries).toEqual([1_000, 2_000, 4_000]);
    expect(transport.calls).toHaveLength(4);
    expect(states[states.length - 1]).toBe('connected');
    expect(session.stats().failed).toBe(3);

    await session.tick();
    expect(session.stats().published).toBe(1);
    expect(backoff.currentDelayMs).toBe(1_000);

    transport.connections[0]?.lose(new TransportFailureError('connection closed'));
    expect(retries).toEqual([1_000, 2_000, 4_000, 1_000]);
    expect(session.stats().state).toBe('disconnected');

    await session.shutdown();
  });

  it('should invalidate the credential cache when the broker rejects it', async () => {
    const credentials = {
      resolve: jest.fn(async () => credential),
      invalidate: jest.fn(),
      release: jest.fn((_credential: Credential) => undefined),
    };
    const { session, transport, retries } = build({ credentials });
    transport.failures.push(new AuthenticationFailureError('not authorized'));

    await session.connect();

    expect(transport.calls[0]?.credential).toBe(credential);
    expect(credentials.invalidate).toHaveBeenCalledTimes(1);
    expect(credentials.release).toHaveBeenCalledWith(credential);
    expect(retries).toEqual([1_000]);
    expect(session.stats().state).toBe('disconnected');

    await session.shutdown();
  });

  it('should retry when no credential can be resolved', async () => {
    const credentials = {
      resolve: jest.fn(async (): Promise<Credential> => {
        throw new CredentialUnavailableError('no credential source configured');
      }),
      invalidate: jest.fn(),
      release: jest.fn((_credential: Credential) => undefined),
    };
    const { session, transport, retries, states } = build({ credentials });

    await session.connect();

    expect(transport.calls).toHaveLength(0);
    expect(states).toEqual(['connecting', 'disconnected']);
    expect(retries).toEqual([1_000]);
    expect(credentials.invalidate).not.toHaveBeenCalled();
    expect(credentials.release).not.toHaveBeenCalled();

    await session.shutdown();
  });

  it('should hand the credential back once its connection is gone', async () => {
    const credentials = {
      resolve: jest.fn(async () => credential),
      invalidate: jest.fn(),
      release: jest.fn((_credential: Credential) => undefined),
    };
    const { session, transport } = build({ credentials });
    await session.connect();
    expect(credentials.release).not.toHaveBeenCalled();

    transport.connections[0]?.lose(new TransportFailureError('connection closed'));
    await flush();
    expect(credentials.release).toHaveBeenCalledTimes(1);
    expect(credentials.release).toHaveBeenCalledWith(credential);

    jest.advanceTimersByTime(1_000);
    await flush();
    expect(session.stats().state).toBe('connected');

    await session.shutdown();
    expect(credentials.resolve).toHaveBeenCalledTimes(2);
    expect(credentials.release).toHaveBeenCalledTimes(2);
  });

  it('should wait the interval the cadence gives before each reading', async () => {
    const delays = [10_000, 30_000, 20_000];
    const { session, transport } = build({ nextIntervalMs: () => delays.shift() ?? 60_000 });
    session.start();
    await flush();
    const published = () => transport.connections[0]?.published.length ?? 0;

    jest.advanceTimersByTime(9_999);
    await flush();
    expect(published()).toBe(0);
    jest.advanceTimersByTime(1);
    await flush();
    expect(published()).toBe(1);

    jest.advanceTimersByTime(29_999);
    await flush();
    expect(published()).toBe(1);
    jest.advanceTimersByTime(1);
    await flush();
    expect(published()).toBe(2);

    jest.advanceTimersByTime(20_000);
    await flush();
    expect(published()).toBe(3);

    await session.shutdown();
  });

  it('should drop the reading and reconnect when a publish fails', async () => {
    const { session, transport, retries, dropped } = build();
    await session.connect();
    const connection = transport.connections[0];
    if (!connection) throw new Error('expected a connection');
    connection.failNext = new TransportFailureError('publish failed: timeout');

    await session.tick();

    expect(session.stats()).toEqual({ state: 'disconnected', published: 0, dropped: 1, failed: 1 });
    expect(dropped[0]?.[1]).toBe('publish failed: timeout');
    expect(connection.closed).toBe(true);
    expect(retries).toEqual([1_000]);

    jest.advanceTimersByTime(1_000);
    await flush();
    expect(session.stats().state).toBe('connected');
    expect(transport.connections).toHaveLength(2);

    await session.shutdown();
  });

  it('should close immediately on shutdown and leave no timers behind', async () => {
    const { session, transport } = build();
    session.start();
    await flush();

    const done = session.shutdown();
    expect(session.stats().state).toBe('closed');
    await done;

    expect(transport.connections[0]?.closed).toBe(true);
    expect(jest.getTimerCount()).toBe(0);
    jest.advanceTimersByTime(120_000);
    await flush();
    expect(session.stats().published).toBe(0);
  });

  it('should cancel a pending retry on shutdown', async () => {
    const { session, transport } = build();
    transport.failures.push(new TransportFailureError('refused'));
    await session.connect();
    expect(jest.getTimerCount()).toBe(1);

    await session.shutdown();
    expect(jest.getTimerCount()).toBe(0);
  });

  it('should close a connection that completes after shutdown', async () => {
    const { session, transport } = build();
    let release: () => void = () => undefined;
    transport.hold = new Promise<void>((resolve) => {
      release = resolve;
    });

    const connecting = session.connect();
    await flush();
    await session.shutdown();
    expect(transport.calls[0]?.signal?.aborted).toBe(true);

    release();
    await connecting;
    expect(transport.connections[0]?.closed).toBe(true);
    expect(session.stats().state).toBe('closed');
  });

  it('should shut down when the external signal aborts', async () => {
    const controller = new AbortController();
    const { session } = build({ signal: controller.signal });
    session.start();
    await flush();

    controller.abort();
    expect(session.stats().state).toBe('closed');
    await flush();
    expect(jest.getTimerCount()).toBe(0);
  });
});
