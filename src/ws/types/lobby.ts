export type LobbyId = string;
export type PlayerId = string;

/** Restaurant card as produced by the recommendation provider; passed through untouched. */
export type RestaurantRecord = Record<string, unknown>;

export interface Lobby {
  id: LobbyId;
  hostId: PlayerId;
  createdAt: number;
  lastActivityAt: number;
  players: Set<PlayerId>;
  recommendations: RestaurantRecord[];
  selection: RestaurantRecord | null;
  location: string;
  mood: string;
}

/** Host-only fields. `undefined` leaves a field as is; `selection: null` clears it. */
export interface LobbyStatePatch {
  recommendations?: RestaurantRecord[];
  selection?: RestaurantRecord | null;
  location?: string;
  mood?: string;
}

export interface LobbySummary {
  lobbyId: LobbyId;
  playerCount: number;
  hasRecommendations: boolean;
  hasSelection: boolean;
  location: string;
  mood: string;
}

export type LobbyErrorCode = 'NOT_FOUND' | 'ALREADY_MEMBER' | 'NOT_HOST';

export interface LobbyFailure {
  code: LobbyErrorCode;
  message: string;
}

export type LobbyResult<T> = { ok: true; value: T } | { ok: false; error: LobbyFailure };

export type LobbyRemovalReason = 'empty' | 'expired';

export interface LobbyRemovedEvent {
  lobbyId: LobbyId;
  reason: LobbyRemovalReason;
}

export interface LeaveOutcome {
  removed: boolean;
  lobby?: Lobby;
}
