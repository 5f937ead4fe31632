import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'http';
import type { AccessGatePort, Reading, StreamPublisherPort } from '@sensorgrid/domain';
import { AUTH_CHALLENGE, isAuthorized } from '../middleware/access-gate.js';

type WsMessage = { type: 'reading'; data: Reading };

export interface WsGatewayOptions {
  path?: string;
  gate?: AccessGatePort;
}

/** Broadcasts each stored reading to connected dashboard clients. */
export class WsGateway implements StreamPublisherPort {
  private readonly wss: WebSocketServer;
  private readonly clients = new Set<WebSocket>();

  constructor(server: Server, options: WsGatewayOptions = {}) {
    const { gate } = options;
    this.wss = new WebSocketServer({
      server,
      path: options.path ?? '/ws',
      verifyClient: gate
        ? (info, done) => {
            isAuthorized(gate, info.req.headers)
              .then((ok) =>
                ok ? done(true) : done(false, 401, 'Unauthorized', { 'WWW-Authenticate': AUTH_CHALLENGE }),
              )
              .catch(() => done(false, 401, 'Unauthorized'));
          }
        : undefined,
    });

    this.wss.on('connection', (ws) => {
      this.clients.add(ws);
      ws.on('close', () => this.clients.delete(ws));
      ws.on('error', () => this.clients.delete(ws));
    });

    console.log(`[ws-gateway] listening on ${options.path ?? '/ws'}`);
  }

  get clientCount(): number {
    return this.clients.size;
  }

  private broadcast(msg: WsMessage): void {
    const payload = JSON.stringify(msg);
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    }
  }

  async publishReading(reading: Reading): Promise<void> {
    this.broadcast({ type: 'reading', data: reading });
  }

  close(): Promise<void> {
    for (const client of this.clients) client.terminate();
    this.clients.clear();
    return new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
