/**
 * WebSocket live event feed.
 * Broadcasts committed governance notifications (proposal.created, vote.cast,
 * delegation.granted, etc.) to all connected WebSocket clients.
 */

import type { FastifyInstance } from 'fastify';
import { eventBus, EventType } from '../infra/eventBus.js';
import { isoNow } from '../utils/time.js';

interface WSLike {
  readyState: number;
  send(data: string): void;
  on(event: string, cb: () => void): void;
}

const OPEN = 1;

const clients = new Set<WSLike>();

/** Number of currently connected WebSocket clients. */
export function connectedClients(): number {
  return clients.size;
}

export function broadcast(event: EventType, data: unknown): void {
  const message = JSON.stringify({ type: event, data, ts: isoNow() });

  for (const ws of clients) {
    if (ws.readyState === OPEN) {
      ws.send(message);
    }
  }
}

/**
 * Register the WebSocket endpoint and subscribe to the event bus.
 * Must be called AFTER @fastify/websocket is registered on the Fastify instance.
 * The bus subscription is dropped when the app closes.
 */
export async function registerWebSocket(app: FastifyInstance): Promise<void> {
  const unsubscribe = eventBus.on('*', broadcast);
  app.addHook('onClose', async () => {
    unsubscribe();
  });

  app.get('/ws', { websocket: true }, (socket: WSLike) => {
    clients.add(socket);

    socket.send(JSON.stringify({
      type: 'connected',
      data: { clients: clients.size },
      ts: isoNow(),
    }));

    socket.on('close', () => {
      clients.delete(socket);
    });

    socket.on('error', () => {
      clients.delete(socket);
    });
  });
}
