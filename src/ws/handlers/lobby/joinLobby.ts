import type { ClientConnection } from '@types';
import type { JoinLobbyInput } from '@utils/validator/lobby.validator.js';
import { lobbyStateEvent } from '@ws/services/transport/BroadcasterLobby.js';
import logger from '@logger';
import type { LobbyContext } from '../context.js';

/**
 * Attach a connection to a lobby. Unlike the HTTP join this tolerates a player
 * who is already a member (page reloads, or a REST join followed by the socket join).
 */
export async function handleJoinLobby(ctx: LobbyContext, client: ClientConnection, msg: JoinLobbyInput) {
  const lobbyId = msg.lobby_id;
  const playerId = msg.player_id ?? client.connectionId;

  const result = await ctx.lobbies.ensureMember(lobbyId, playerId);
  ctx.metrics.recordOperation('ensure_member', result.ok ? 'ok' : result.error.code);
  if (!result.ok) {
    client.send({ type: 'error', code: result.error.code, message: result.error.message });
    logger.warn(`[JOIN_LOBBY] ${playerId} could not join ${lobbyId}`, { code: result.error.code });
    return;
  }

  const { lobby, added } = result.value;
  client.lobbyId = lobby.id;
  client.playerId = playerId;
  logger.info(`[JOIN_LOBBY] ${playerId} attached to lobby ${lobby.id}`, { added, playerCount: lobby.players.size });

  ctx.broadcaster.toLobby(
    lobby.id,
    { type: 'player_joined', player_id: playerId, player_count: lobby.players.size },
    client,
  );
  client.send(lobbyStateEvent(lobby, playerId));
}
