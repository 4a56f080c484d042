// index.ts
import { createServer } from 'http';
import { env } from '@config/env.js';
import logger from '@logger';
import { createApp } from './app.js';
import { setupWebSocket } from './ws/wsServer.js';
import { ConnectionManager } from './ws/connectionManager.js';
import { LobbyManager } from './ws/services/lobbyManager.js';
import { LobbyBroadcaster } from './ws/services/transport/BroadcasterLobby.js';
import { LobbyMetrics } from './monitoring/metrics.js';
import { HttpRecommendationProvider } from './services/recommendations/httpProvider.js';

const lobbies = new LobbyManager({
  expirationMs: env.LOBBY_EXPIRATION_MINUTES * 60 * 1000,
  sweepIntervalMs: env.LOBBY_SWEEP_INTERVAL_SECONDS * 1000,
});
const metrics = new LobbyMetrics({ countLobbies: () => lobbies.count(), collectDefaults: true });
const connections = new ConnectionManager();
const broadcaster = new LobbyBroadcaster(connections);

const provider = env.RECOMMENDER_URL
  ? new HttpRecommendationProvider({ url: env.RECOMMENDER_URL, timeoutMs: env.RECOMMENDER_TIMEOUT_MS })
  : undefined;
if (!provider) {
  logger.warn('[SEARCH] RECOMMENDER_URL not set; /api/search will answer 503');
}

const app = createApp({
  lobbies,
  metrics,
  provider,
  cacheTtlMs: env.SEARCH_CACHE_TTL_SECONDS * 1000,
  corsOrigin: env.CORS_ORIGIN,
  isProduction: env.isProduction,
});
const httpServer = createServer(app);
const gateway = setupWebSocket(httpServer, { lobbies, broadcaster, metrics }, connections);
lobbies.start();

// Graceful shutdown
const gracefulShutdown = (signal: string) => {
  logger.info(`[SHUTDOWN] Received ${signal}`);
  lobbies.stop();
  gateway
    .shutdown()
    .then(
      () =>
        new Promise<void>((resolve, reject) => {
          httpServer.close((err) => (err ? reject(err) : resolve()));
        }),
    )
    .then(() => {
      logger.info('[SHUTDOWN] Done');
      process.exit(0);
    })
    .catch((err: unknown) => {
      logger.error('[SHUTDOWN_ERROR]', { error: err instanceof Error ? err.message : err });
      process.exit(1);
    });
};
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error('[UNHANDLED_REJECTION]', { reason: reason instanceof Error ? reason.message : reason });
});

httpServer.listen(env.PORT, () => {
  logger.info(`🚀 Server running on http://localhost:${env.PORT}`);
});
