import type { Server as HttpServer } from 'http';
import { WebSocketServer, type RawData } from 'ws';
import { RateLimiterMemory } from 'rate-limiter-flexible';
import { z } from 'zod';
import type { WsMessage } from '@types';
import logger from '@logger';
import { routeWsMessage } from './wsRouter.js';
import { ConnectionManager } from './connectionManager.js';
import type { LobbyContext } from './handlers/context.js';

const WsEnvelopeSchema = z.looseObject({ type: z.string().min(1) });

export interface RealtimeGateway {
  wss: WebSocketServer;
  connections: ConnectionManager;
  shutdown: () => Promise<void>;
}

function rawToString(raw: RawData): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf8');
  if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString('utf8');
  return raw.toString('utf8');
}

export function parseWsMessage(raw: string): WsMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = WsEnvelopeSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

/**
 * Detaches and notifies connections still attached to a lobby once it leaves
 * the table, for any reason, so a reused id never reaches them.
 * Returns the unsubscribe function.
 */
export function bindLobbyLifecycle(ctx: LobbyContext): () => void {
  return ctx.lobbies.onLobbyRemoved(({ lobbyId, reason }) => {
    ctx.broadcaster.closeLobby(lobbyId, reason);
  });
}

export const setupWebSocket = (
  server: HttpServer,
  ctx: LobbyContext,
  connections: ConnectionManager = new ConnectionManager(),
): RealtimeGateway => {
  const wss = new WebSocketServer({ server, path: '/ws', maxPayload: 256 * 1024 });
  // max 10 wiadomości na sekundę per IP
  const messageLimiter = new RateLimiterMemory({ points: 10, duration: 1 });

  const detachLifecycle = bindLobbyLifecycle(ctx);

  wss.on('connection', (socket, req) => {
    const ip = req.socket.remoteAddress || 'unknown';
    const client = connections.add(socket, ip);
    logger.info(`✅ New WS connection from ${ip}`, { connectionId: client.connectionId });
    client.send({ type: 'connected', connection_id: client.connectionId });

    socket.on('message', async (raw: RawData) => {
      try {
        await messageLimiter.consume(ip);
      } catch {
        client.send({ type: 'error', code: 'RATE_LIMITED', message: 'Too many messages, slow down!' });
        logger.warn(`🚫 Rate limit exceeded for ${ip}`);
        return;
      }

      const data = parseWsMessage(rawToString(raw));
      if (!data) {
        client.send({ type: 'error', code: 'INVALID_MESSAGE', message: 'Expected a JSON object with a type' });
        logger.warn('❌ [wsServer] Invalid message received', { connectionId: client.connectionId });
        return;
      }

      try {
        await routeWsMessage(ctx, client, data);
      } catch (err) {
        logger.error('❌ [wsServer] Error handling WS message', { type: data.type, error: err });
      }
    });

    socket.on('close', () => {
      connections.remove(client.connectionId);
      logger.info(`[wsServer] WS disconnected: ${client.playerId ?? client.connectionId}`, {
        lobbyId: client.lobbyId,
        activeConnections: connections.size,
      });
    });

    socket.on('error', (err) => {
      logger.error('❌ [wsServer] WS error', { error: err.message, connectionId: client.connectionId });
    });
  });

  connections.startHeartbeat();
  logger.info('🌐 [wsServer] WebSocket server initialized at /ws');

  const shutdown = () =>
    new Promise<void>((resolve, reject) => {
      detachLifecycle();
      connections.shutdown();
      wss.close((err) => (err ? reject(err) : resolve()));
    });

  return { wss, connections, shutdown };
};
