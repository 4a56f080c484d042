import { Router } from 'express';
import { rateLimit } from 'express-rate-limit';
import { createLobbyHandlers, type LobbyHandlerDeps } from '../handlers/lobbyHandlers.js';
import { createSearchHandlers, type SearchHandlerDeps } from '../handlers/searchHandlers.js';
import { asyncHandler } from '../handlers/respond.js';

export type ApiDeps = LobbyHandlerDeps & SearchHandlerDeps;

// 5 lobbies per 10 s per IP
const createLobbyLimiter = () =>
  rateLimit({
    windowMs: 10 * 1000,
    limit: 5,
    standardHeaders: true,
    legacyHeaders: false,
    message: { success: false, error: 'Too many lobbies created, try again shortly' },
  });

export function createApiRouter(deps: ApiDeps) {
  const router = Router();
  const lobby = createLobbyHandlers(deps);
  const { search } = createSearchHandlers(deps);

  // --- Lobby ---
  router.post('/lobby/create', createLobbyLimiter(), asyncHandler(lobby.createLobby));
  router.post('/lobby/join', asyncHandler(lobby.joinLobby));
  router.get('/lobby/:lobbyId/info', asyncHandler(lobby.getLobbyInfo));

  // --- Recommendations ---
  router.post('/search', asyncHandler(search));

  return router;
}
