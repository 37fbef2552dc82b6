import WebSocket, { type RawData, type WebSocketServer } from 'ws';
import type { IncomingMessage } from 'http';
import { SERIES_CHANNEL, type Publisher } from './publisher';

export interface Recipient {
  readonly readyState: number;
  send(data: string): void;
}

export interface Subscriber {
  subscribe(channel: string): Promise<unknown>;
  on(event: 'message', listener: (channel: string, message: string) => void): unknown;
}

type Filter = { token?: string };

function tokenOf(message: string): string | undefined {
  try {
    const payload: unknown = JSON.parse(message);
    if (payload && typeof payload === 'object' && 'token' in payload && typeof payload.token === 'string') {
      return payload.token;
    }
  } catch {
    return undefined;
  }
  return undefined;
}

function parseFilterMessage(raw: string): Filter | undefined {
  try {
    const msg: unknown = JSON.parse(raw);
    if (!msg || typeof msg !== 'object' || !('type' in msg) || msg.type !== 'setFilter') return undefined;
    const token = 'token' in msg && typeof msg.token === 'string' && msg.token.length ? msg.token : undefined;
    return { token };
  } catch {
    return undefined;
  }
}

/** Tracks per-socket token filters and fans series updates out to matching sockets. */
export class SeriesBroadcaster {
  private readonly filters = new Map<Recipient, Filter>();

  register(client: Recipient, url = '/') {
    const token = new URL(url, 'http://localhost').searchParams.get('token') || undefined;
    this.filters.set(client, { token });
  }

  handleMessage(client: Recipient, raw: string) {
    const next = parseFilterMessage(raw);
    if (next && this.filters.has(client)) this.filters.set(client, next);
  }

  unregister(client: Recipient) {
    this.filters.delete(client);
  }

  broadcast(message: string): number {
    const token = tokenOf(message);
    let sent = 0;
    for (const [client, f] of this.filters) {
      if (client.readyState !== WebSocket.OPEN) continue;
      if (token && f.token && f.token !== token) continue;
      try {
        client.send(message);
        sent += 1;
      } catch (e) {
        console.error('ws send failed', e);
      }
    }
    return sent;
  }

  /** Publisher that delivers straight to sockets, for runs without Redis. */
  asPublisher(): Publisher {
    return {
      publish: async (_channel, message) => this.broadcast(message),
    };
  }
}

export function attachWebSockets(wss: WebSocketServer, broadcaster: SeriesBroadcaster) {
  wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
    broadcaster.register(ws, req.url);
    ws.on('message', (m: RawData) => broadcaster.handleMessage(ws, String(m)));
    ws.on('close', () => broadcaster.unregister(ws));
  });
}

export async function relayFromRedis(subscriber: Subscriber, broadcaster: SeriesBroadcaster) {
  subscriber.on('message', (channel, message) => {
    if (channel === SERIES_CHANNEL) broadcaster.broadcast(message);
  });
  await subscriber.subscribe(SERIES_CHANNEL);
}
