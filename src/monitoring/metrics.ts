// monitoring/metrics.ts
import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

export type LobbyOperation = 'create' | 'join' | 'ensure_member' | 'leave' | 'update_state' | 'summary' | 'search';

export interface MetricsOptions {
  /** Live lobby count, read on every scrape. */
  countLobbies: () => Promise<number>;
  /** Process-level default metrics (heap, event loop lag, ...). */
  collectDefaults?: boolean;
}

/**
 * Prometheus metrics for the lobby server, kept on a private registry so
 * several instances (tests) never collide on metric names.
 */
export class LobbyMetrics {
  readonly registry = new Registry();

  readonly lobbyOperations = new Counter({
    name: 'lobby_operations_total',
    help: 'Lobby operations by outcome',
    labelNames: ['operation', 'result'] as const,
    registers: [this.registry],
  });

  readonly wsMessages = new Counter({
    name: 'ws_messages_total',
    help: 'Inbound WebSocket messages by type',
    labelNames: ['type'] as const,
    registers: [this.registry],
  });

  readonly activeLobbies: Gauge;

  constructor(options: MetricsOptions) {
    const { countLobbies } = options;
    this.activeLobbies = new Gauge({
      name: 'lobbies_active',
      help: 'Lobbies currently held in memory',
      registers: [this.registry],
      async collect() {
        this.set(await countLobbies());
      },
    });

    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }
  }

  recordOperation(operation: LobbyOperation, result: string) {
    this.lobbyOperations.inc({ operation, result });
  }

  recordMessage(type: string) {
    this.wsMessages.inc({ type });
  }

  contentType(): string {
    return this.registry.contentType;
  }

  render(): Promise<string> {
    return this.registry.metrics();
  }
}
