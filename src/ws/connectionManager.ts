// ws/connectionManager.ts
import { WebSocket } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import type { ClientConnection, LobbyId, ServerEvent } from '@types';
import logger from '@logger';

const HEARTBEAT_INTERVAL_MS = 25_000;

/** {@link ClientConnection} backed by a `ws` socket. */
export class SocketConnection implements ClientConnection {
  readonly connectionId = uuidv4();
  readonly connectedAt = new Date();
  playerId?: string;
  lobbyId?: LobbyId;
  isAlive = true;

  constructor(
    readonly socket: WebSocket,
    readonly ip: string,
  ) {
    socket.on('pong', () => {
      this.isAlive = true;
    });
  }

  send(event: ServerEvent) {
    if (this.socket.readyState !== WebSocket.OPEN) return;
    this.socket.send(JSON.stringify(event));
  }
}

export class ConnectionManager {
  private connections = new Map<string, SocketConnection>();
  private heartbeat: NodeJS.Timeout | null = null;

  add(socket: WebSocket, ip: string): SocketConnection {
    const connection = new SocketConnection(socket, ip);
    this.connections.set(connection.connectionId, connection);
    logger.debug('[CONNECTION] Created new connection', { connectionId: connection.connectionId, ip });
    return connection;
  }

  remove(connectionId: string): boolean {
    const removed = this.connections.delete(connectionId);
    if (removed) logger.debug('[CONNECTION] Removed connection', { connectionId });
    return removed;
  }

  all(): ClientConnection[] {
    return Array.from(this.connections.values());
  }

  inLobby(lobbyId: LobbyId): ClientConnection[] {
    return this.all().filter((c) => c.lobbyId === lobbyId);
  }

  get size(): number {
    return this.connections.size;
  }

  /** Pings every socket; sockets that missed the previous pong are terminated. */
  startHeartbeat() {
    if (this.heartbeat) return;
    this.heartbeat = setInterval(() => {
      for (const connection of this.connections.values()) {
        if (!connection.isAlive) {
          logger.warn('[CONNECTION] Terminating unresponsive connection', { connectionId: connection.connectionId });
          connection.socket.terminate();
          this.remove(connection.connectionId);
          continue;
        }
        connection.isAlive = false;
        connection.socket.ping();
      }
    }, HEARTBEAT_INTERVAL_MS);
    this.heartbeat.unref();
  }

  shutdown() {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
    for (const connection of this.connections.values()) {
      connection.socket.close(1001, 'Server shutting down');
    }
    this.connections.clear();
    logger.info('[CONNECTION_MANAGER] Shutdown complete');
  }
}
