import type { LobbyId, PlayerId } from './lobby.js';

export interface WsMessage {
  type: string;
  [key: string]: unknown;
}

/** One realtime client. `playerId`/`lobbyId` are set once the client joins a lobby. */
export interface ClientConnection {
  readonly connectionId: string;
  readonly ip: string;
  readonly connectedAt: Date;
  playerId?: PlayerId;
  lobbyId?: LobbyId;
  send(event: ServerEvent): void;
}

export type ServerEvent =
  | { type: 'connected'; connection_id: string }
  | {
      type: 'lobby_state';
      lobby_id: LobbyId;
      recommendations: unknown[];
      selection: unknown;
      location: string;
      mood: string;
      is_host: boolean;
      player_count: number;
    }
  | { type: 'player_joined'; player_id: PlayerId; player_count: number }
  | { type: 'player_left'; player_id: PlayerId; player_count: number }
  | { type: 'left_lobby'; lobby_id: LobbyId }
  | {
      type: 'state_updated';
      recommendations: unknown[];
      selection: unknown;
      location: string;
      mood: string;
    }
  | { type: 'lobby_closed'; lobby_id: LobbyId; reason: string }
  | { type: 'error'; code: string; message: string }
  | {
      type: 'validation_error';
      message: string;
      operation: string;
      details: Array<{ field: string; message: string }> | null;
    }
  | { type: 'server_error'; message: string; operation: string };
