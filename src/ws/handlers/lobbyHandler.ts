import type { ClientConnection, WsMessage } from '@types';
import * as LobbyHandlers from './lobby/index.js';
import { validateMessage } from '@utils/wsValidators.js';
import { HostUpdateSchema, JoinLobbySchema, LeaveLobbySchema } from '@utils/validator/lobby.validator.js';
import { ErrorHandler } from '../../middleware/errorHandler.js';
import logger from '@logger';
import type { LobbyContext } from './context.js';

// --- Router ---
export const routeLobbyMessage = async (ctx: LobbyContext, client: ClientConnection, msg: WsMessage) => {
  logger.debug('[lobbyHandler] Incoming message', { type: msg.type, connectionId: client.connectionId });

  try {
    switch (msg.type) {
      case 'join_lobby':
        await LobbyHandlers.handleJoinLobby(ctx, client, validateMessage(JoinLobbySchema, msg, msg.type));
        break;
      case 'leave_lobby':
        await LobbyHandlers.handleLeaveLobby(ctx, client, validateMessage(LeaveLobbySchema, msg, msg.type));
        break;
      case 'host_update':
        await LobbyHandlers.handleHostUpdate(ctx, client, validateMessage(HostUpdateSchema, msg, msg.type));
        break;
      default:
        logger.warn(`[lobbyHandler] Unknown lobby message type: ${msg.type}`);
        client.send({ type: 'error', code: 'UNKNOWN_TYPE', message: `Unknown lobby type: ${msg.type}` });
        return;
    }
    logger.debug(`[lobbyHandler] Handler executed successfully for type: ${msg.type}`, {
      connectionId: client.connectionId,
    });
  } catch (err) {
    const lobbyId = typeof msg.lobby_id === 'string' ? msg.lobby_id : undefined;
    ErrorHandler.reportWsError(err, { client, operation: msg.type, lobbyId });
  }
};
