import type { ClientConnection } from '@types';
import type { LeaveLobbyInput } from '@utils/validator/lobby.validator.js';
import logger from '@logger';
import type { LobbyContext } from '../context.js';

/**
 * Handle player leaving a lobby. Leaving is idempotent; the last player out
 * removes the lobby. Every connection of the leaving player is detached
 * before the membership changes, so none of them hears later broadcasts.
 */
export async function handleLeaveLobby(ctx: LobbyContext, client: ClientConnection, msg: LeaveLobbyInput) {
  const lobbyId = msg.lobby_id;
  const playerId = msg.player_id ?? client.playerId ?? client.connectionId;

  const detached = ctx.broadcaster.detachPlayer(lobbyId, playerId);
  if (client.lobbyId === lobbyId) {
    client.lobbyId = undefined;
  }

  const outcome = await ctx.lobbies.leaveLobby(lobbyId, playerId);
  ctx.metrics.recordOperation('leave', outcome.removed ? 'removed' : 'ok');

  client.send({ type: 'left_lobby', lobby_id: lobbyId });
  for (const other of detached) {
    if (other !== client) other.send({ type: 'left_lobby', lobby_id: lobbyId });
  }

  if (outcome.lobby) {
    ctx.broadcaster.toLobby(lobbyId, {
      type: 'player_left',
      player_id: playerId,
      player_count: outcome.lobby.players.size,
    });
  }

  logger.info(`[LEAVE_LOBBY] ${playerId} left lobby ${lobbyId}`, {
    lobbyRemoved: outcome.removed,
    detachedConnections: detached.length,
  });
}
