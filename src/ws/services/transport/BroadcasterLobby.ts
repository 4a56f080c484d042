import type { ClientConnection, Lobby, LobbyId, ServerEvent } from '@types';
import logger from '@logger';

/**
 * BroadcasterLobby
 * ----------------
 * Delivers lobby events to the realtime clients attached to a lobby.
 */

export interface ConnectionSource {
  inLobby(lobbyId: LobbyId): ClientConnection[];
}

export function lobbyStateEvent(lobby: Lobby, playerId: string): ServerEvent {
  return {
    type: 'lobby_state',
    lobby_id: lobby.id,
    recommendations: lobby.recommendations,
    selection: lobby.selection,
    location: lobby.location,
    mood: lobby.mood,
    is_host: lobby.hostId === playerId,
    player_count: lobby.players.size,
  };
}

export function stateUpdatedEvent(lobby: Lobby): ServerEvent {
  return {
    type: 'state_updated',
    recommendations: lobby.recommendations,
    selection: lobby.selection,
    location: lobby.location,
    mood: lobby.mood,
  };
}

export class LobbyBroadcaster {
  constructor(private readonly connections: ConnectionSource) {}

  /** Sends `event` to every connection in the lobby except `exclude`; returns the recipient count. */
  toLobby(lobbyId: LobbyId, event: ServerEvent, exclude?: ClientConnection): number {
    let recipients = 0;
    for (const client of this.connections.inLobby(lobbyId)) {
      if (client === exclude) continue;
      client.send(event);
      recipients++;
    }
    logger.debug(`[BROADCAST] ${event.type} to lobby ${lobbyId}`, { recipients });
    return recipients;
  }

  /** Detaches every connection of `playerId` from the lobby (all of the player's tabs). */
  detachPlayer(lobbyId: LobbyId, playerId: string): ClientConnection[] {
    const detached = this.connections.inLobby(lobbyId).filter((client) => client.playerId === playerId);
    for (const client of detached) {
      client.lobbyId = undefined;
    }
    return detached;
  }

  /** Notifies and detaches every connection still attached to a removed lobby. */
  closeLobby(lobbyId: LobbyId, reason: string): number {
    const clients = this.connections.inLobby(lobbyId);
    for (const client of clients) {
      client.send({ type: 'lobby_closed', lobby_id: lobbyId, reason });
      client.lobbyId = undefined;
    }
    if (clients.length) {
      logger.info(`[BROADCAST] Lobby ${lobbyId} closed`, { reason, recipients: clients.length });
    }
    return clients.length;
  }
}
