import type { LobbyManager } from '@ws/services/lobbyManager.js';
import type { LobbyBroadcaster } from '@ws/services/transport/BroadcasterLobby.js';
import type { LobbyMetrics } from '../../monitoring/metrics.js';

/** Collaborators every realtime handler works with; built once at startup. */
export interface LobbyContext {
  lobbies: LobbyManager;
  broadcaster: LobbyBroadcaster;
  metrics: LobbyMetrics;
}
