import type { ClientConnection, LobbyStatePatch } from '@types';
import type { HostUpdateInput } from '@utils/validator/lobby.validator.js';
import { stateUpdatedEvent } from '@ws/services/transport/BroadcasterLobby.js';
import logger from '@logger';
import type { LobbyContext } from '../context.js';

const PATCH_FIELDS = ['recommendations', 'selection', 'location', 'mood'] as const;

/**
 * Host pushes recommendations, a selection, or the search context.
 * Only fields present in the message change; everyone in the lobby,
 * host included, gets the resulting state.
 */
export async function handleHostUpdate(ctx: LobbyContext, client: ClientConnection, msg: HostUpdateInput) {
  const lobbyId = msg.lobby_id;
  const requesterId = msg.player_id ?? client.playerId ?? client.connectionId;

  const patch: LobbyStatePatch = {
    recommendations: msg.recommendations,
    selection: msg.selection,
    location: msg.location,
    mood: msg.mood,
  };

  const result = await ctx.lobbies.updateState(lobbyId, requesterId, patch);
  ctx.metrics.recordOperation('update_state', result.ok ? 'ok' : result.error.code);
  if (!result.ok) {
    client.send({ type: 'error', code: result.error.code, message: result.error.message });
    logger.warn(`[HOST_UPDATE] Rejected update from ${requesterId} in ${lobbyId}`, { code: result.error.code });
    return;
  }

  const lobby = result.value;
  ctx.broadcaster.toLobby(lobby.id, stateUpdatedEvent(lobby));
  logger.info(`[HOST_UPDATE] Lobby ${lobby.id} updated`, {
    fields: PATCH_FIELDS.filter((field) => patch[field] !== undefined),
  });
}
