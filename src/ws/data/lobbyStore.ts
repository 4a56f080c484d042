import type { Lobby, LobbyId } from '@types';
import { Mutex } from 'async-mutex';

/**
 * In-memory lobby table guarded by a single mutex.
 * The accessors below assume the caller already holds the lock via `withLock`.
 */
export class LobbyStore {
  private lobbies = new Map<LobbyId, Lobby>();
  private mutex = new Mutex();

  async withLock<T>(operation: () => Promise<T> | T): Promise<T> {
    const release = await this.mutex.acquire();
    try {
      return await operation();
    } finally {
      release();
    }
  }

  get(id: LobbyId): Lobby | undefined {
    return this.lobbies.get(id);
  }

  has(id: LobbyId): boolean {
    return this.lobbies.has(id);
  }

  set(lobby: Lobby) {
    this.lobbies.set(lobby.id, lobby);
  }

  delete(id: LobbyId): boolean {
    return this.lobbies.delete(id);
  }

  values(): IterableIterator<Lobby> {
    return this.lobbies.values();
  }

  get size(): number {
    return this.lobbies.size;
  }
}
