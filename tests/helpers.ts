import type { ClientConnection, LobbyId, ServerEvent } from '@types';
import type { ConnectionSource } from '@ws/services/transport/BroadcasterLobby.js';

export class FakeClient implements ClientConnection {
  readonly ip = '127.0.0.1';
  readonly connectedAt = new Date(0);
  playerId?: string;
  lobbyId?: LobbyId;
  readonly sent: ServerEvent[] = [];

  constructor(readonly connectionId: string) {}

  send(event: ServerEvent) {
    this.sent.push(event);
  }

  last(): ServerEvent | undefined {
    return this.sent[this.sent.length - 1];
  }
}

export class FakeConnections implements ConnectionSource {
  readonly clients: FakeClient[] = [];

  connect(connectionId: string): FakeClient {
    const client = new FakeClient(connectionId);
    this.clients.push(client);
    return client;
  }

  inLobby(lobbyId: LobbyId): ClientConnection[] {
    return this.clients.filter((c) => c.lobbyId === lobbyId);
  }
}

/** Random-index source that replays `indices` in a loop. */
export function sequence(indices: number[]) {
  let i = 0;
  return () => indices[i++ % indices.length] ?? 0;
}
