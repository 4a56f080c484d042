import { EventEmitter } from 'events';
import type {
  LeaveOutcome,
  Lobby,
  LobbyErrorCode,
  LobbyId,
  LobbyRemovalReason,
  LobbyRemovedEvent,
  LobbyResult,
  LobbyStatePatch,
  LobbySummary,
  PlayerId,
} from '@types';
import { LobbyStore } from '@ws/data/lobbyStore.js';
import { generateLobbyId, normalizeLobbyId } from '@ws/utils/sessionId.js';
import logger from '@logger';

export interface LobbyManagerOptions {
  expirationMs?: number;
  sweepIntervalMs?: number;
  now?: () => number;
  generateId?: (existing: { has(id: string): boolean }) => string;
  store?: LobbyStore;
}

export const DEFAULT_EXPIRATION_MS = 30 * 60 * 1000;
export const DEFAULT_SWEEP_INTERVAL_MS = 60 * 1000;

const MESSAGES: Record<LobbyErrorCode, string> = {
  NOT_FOUND: 'Lobby not found or expired',
  ALREADY_MEMBER: 'Already in this lobby',
  NOT_HOST: 'Only the host can update lobby state',
};

function fail<T>(code: LobbyErrorCode): LobbyResult<T> {
  return { ok: false, error: { code, message: MESSAGES[code] } };
}

function succeed<T>(value: T): LobbyResult<T> {
  return { ok: true, value };
}

/** Copy handed out to callers so nothing mutates a lobby outside the lock. */
function snapshot(lobby: Lobby): Lobby {
  return {
    ...lobby,
    players: new Set(lobby.players),
    recommendations: [...lobby.recommendations],
  };
}

/**
 * Owns lobby lifecycle: creation, membership, host-only state updates and
 * inactivity expiry. Every operation runs under the store's single lock.
 *
 * Emits `lobby_removed` ({@link LobbyRemovedEvent}) whenever a lobby leaves the table.
 */
export class LobbyManager extends EventEmitter {
  private readonly store: LobbyStore;
  private readonly expirationMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private readonly generateId: (existing: { has(id: string): boolean }) => string;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: LobbyManagerOptions = {}) {
    super();
    this.store = options.store ?? new LobbyStore();
    this.expirationMs = options.expirationMs ?? DEFAULT_EXPIRATION_MS;
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.now = options.now ?? (() => Date.now());
    this.generateId = options.generateId ?? ((existing) => generateLobbyId(existing));
  }

  start() {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweepExpired().catch((err: unknown) => {
        logger.error('[LOBBY_SWEEP] Sweep failed', { error: err instanceof Error ? err.message : err });
      });
    }, this.sweepIntervalMs);
    this.sweepTimer.unref();
    logger.info('[LOBBY_SWEEP] Started', { intervalMs: this.sweepIntervalMs, expirationMs: this.expirationMs });
  }

  stop() {
    if (!this.sweepTimer) return;
    clearInterval(this.sweepTimer);
    this.sweepTimer = null;
    logger.info('[LOBBY_SWEEP] Stopped');
  }

  onLobbyRemoved(listener: (event: LobbyRemovedEvent) => void): () => void {
    this.on('lobby_removed', listener);
    return () => {
      this.off('lobby_removed', listener);
    };
  }

  /** Assumes the caller checked `id` is free; an existing lobby under the same id is replaced. */
  async createLobby(id: LobbyId, hostId: PlayerId): Promise<Lobby> {
    return this.store.withLock(() => snapshot(this.insertLobby(normalizeLobbyId(id), hostId)));
  }

  /** Allocates a free id and creates the lobby in one critical section. */
  async openLobby(hostId: PlayerId): Promise<Lobby> {
    return this.store.withLock(() => {
      const id = this.generateId({ has: (candidate) => this.liveLobby(candidate) !== undefined });
      return snapshot(this.insertLobby(id, hostId));
    });
  }

  async getLobby(id: LobbyId): Promise<Lobby | undefined> {
    return this.store.withLock(() => {
      const lobby = this.liveLobby(normalizeLobbyId(id));
      return lobby && snapshot(lobby);
    });
  }

  /** Strict join: a second join by the same player is an error. */
  async joinLobby(id: LobbyId, playerId: PlayerId): Promise<LobbyResult<Lobby>> {
    return this.store.withLock(() => {
      const lobby = this.liveLobby(normalizeLobbyId(id));
      if (!lobby) return fail<Lobby>('NOT_FOUND');
      if (lobby.players.has(playerId)) return fail<Lobby>('ALREADY_MEMBER');

      lobby.players.add(playerId);
      lobby.lastActivityAt = this.now();
      logger.debug('[JOIN_LOBBY] Player joined', { lobbyId: lobby.id, playerId, playerCount: lobby.players.size });
      return succeed(snapshot(lobby));
    });
  }

  /** Idempotent join: adds the player only when missing. */
  async ensureMember(id: LobbyId, playerId: PlayerId): Promise<LobbyResult<{ lobby: Lobby; added: boolean }>> {
    return this.store.withLock(() => {
      const lobby = this.liveLobby(normalizeLobbyId(id));
      if (!lobby) return fail<{ lobby: Lobby; added: boolean }>('NOT_FOUND');

      const added = !lobby.players.has(playerId);
      if (added) {
        lobby.players.add(playerId);
        lobby.lastActivityAt = this.now();
      }
      return succeed({ lobby: snapshot(lobby), added });
    });
  }

  async leaveLobby(id: LobbyId, playerId: PlayerId): Promise<LeaveOutcome> {
    return this.store.withLock(() => {
      const lobbyId = normalizeLobbyId(id);
      const existing = this.store.get(lobbyId);
      if (!existing) return { removed: false };

      const lobby = this.liveLobby(lobbyId);
      if (!lobby) return { removed: true };

      lobby.players.delete(playerId);
      lobby.lastActivityAt = this.now();

      if (lobby.players.size === 0) {
        this.removeLobby(lobbyId, 'empty');
        return { removed: true };
      }
      return { removed: false, lobby: snapshot(lobby) };
    });
  }

  async updateState(id: LobbyId, requesterId: PlayerId, patch: LobbyStatePatch): Promise<LobbyResult<Lobby>> {
    return this.store.withLock(() => {
      const lobby = this.liveLobby(normalizeLobbyId(id));
      if (!lobby) return fail<Lobby>('NOT_FOUND');
      if (lobby.hostId !== requesterId) return fail<Lobby>('NOT_HOST');

      if (patch.recommendations !== undefined) lobby.recommendations = [...patch.recommendations];
      if (patch.selection !== undefined) lobby.selection = patch.selection;
      if (patch.location !== undefined) lobby.location = patch.location;
      if (patch.mood !== undefined) lobby.mood = patch.mood;
      lobby.lastActivityAt = this.now();

      return succeed(snapshot(lobby));
    });
  }

  async getSummary(id: LobbyId): Promise<LobbySummary | undefined> {
    const lobby = await this.getLobby(id);
    if (!lobby) return undefined;

    return {
      lobbyId: lobby.id,
      playerCount: lobby.players.size,
      hasRecommendations: lobby.recommendations.length > 0,
      hasSelection: lobby.selection !== null,
      location: lobby.location,
      mood: lobby.mood,
    };
  }

  async sweepExpired(): Promise<LobbyId[]> {
    return this.store.withLock(() => {
      const expired: LobbyId[] = [];
      for (const lobby of this.store.values()) {
        if (this.isExpired(lobby)) expired.push(lobby.id);
      }

      for (const id of expired) {
        this.removeLobby(id, 'expired');
      }

      if (expired.length) {
        logger.info(`[LOBBY_SWEEP] Removed ${expired.length} expired lobbies`, { lobbyIds: expired });
      }
      return expired;
    });
  }

  async count(): Promise<number> {
    return this.store.withLock(() => this.store.size);
  }

  private insertLobby(id: LobbyId, hostId: PlayerId): Lobby {
    const timestamp = this.now();
    const lobby: Lobby = {
      id,
      hostId,
      createdAt: timestamp,
      lastActivityAt: timestamp,
      players: new Set([hostId]),
      recommendations: [],
      selection: null,
      location: '',
      mood: '',
    };
    this.store.set(lobby);
    logger.info(`[CREATE_LOBBY] Lobby ${id} created`, { lobbyId: id, hostId });
    return lobby;
  }

  /** Lookup that purges the lobby when it has gone stale. */
  private liveLobby(id: LobbyId): Lobby | undefined {
    const lobby = this.store.get(id);
    if (!lobby) return undefined;
    if (this.isExpired(lobby)) {
      this.removeLobby(id, 'expired');
      return undefined;
    }
    return lobby;
  }

  private isExpired(lobby: Lobby): boolean {
    return this.now() - lobby.lastActivityAt > this.expirationMs;
  }

  private removeLobby(id: LobbyId, reason: LobbyRemovalReason) {
    if (!this.store.delete(id)) return;
    logger.info(`[REMOVE_LOBBY] Lobby ${id} removed`, { lobbyId: id, reason });
    const event: LobbyRemovedEvent = { lobbyId: id, reason };
    this.emit('lobby_removed', event);
  }
}
