// wsRouter.ts
import type { ClientConnection, WsMessage } from '@types';
import { routeLobbyMessage } from './handlers/lobbyHandler.js';
import type { LobbyContext } from './handlers/context.js';
import logger from '@logger';

export function routeWsMessage(ctx: LobbyContext, client: ClientConnection, data: WsMessage) {
  switch (data.type) {
    case 'join_lobby':
    case 'leave_lobby':
    case 'host_update':
      ctx.metrics.recordMessage(data.type);
      return routeLobbyMessage(ctx, client, data);
    default:
      ctx.metrics.recordMessage('unknown');
      logger.warn('❌ [wsRouter] Unknown WS message type:', { type: data.type });
      client.send({ type: 'error', code: 'UNKNOWN_TYPE', message: `Unknown message type: ${data.type}` });
  }
}
