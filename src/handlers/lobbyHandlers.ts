// handlers/lobbyHandlers.ts
import type { Request, Response } from 'express';
import {
  CreateLobbyBodySchema,
  JoinLobbyBodySchema,
  LobbyIdSchema,
} from '@utils/validator/lobby.validator.js';
import type { LobbyManager } from '@ws/services/lobbyManager.js';
import logger from '@logger';
import type { LobbyMetrics } from '../monitoring/metrics.js';
import { parseInput, sendLobbyFailure } from './respond.js';

export interface LobbyHandlerDeps {
  lobbies: LobbyManager;
  metrics: LobbyMetrics;
}

export function createLobbyHandlers({ lobbies, metrics }: LobbyHandlerDeps) {
  /**
   * Create a new lobby; the caller becomes its host.
   */
  const createLobby = async (req: Request, res: Response) => {
    const body = parseInput(res, CreateLobbyBodySchema, req.body, 'create_lobby');
    if (body === undefined) return;

    const lobby = await lobbies.openLobby(body.host_id);
    metrics.recordOperation('create', 'ok');
    logger.info(`[HTTP] Lobby ${lobby.id} created`, { hostId: lobby.hostId });

    return res.json({ success: true, lobby_id: lobby.id, host_id: lobby.hostId });
  };

  /**
   * Join a lobby. Strict: joining twice is a conflict.
   */
  const joinLobby = async (req: Request, res: Response) => {
    const body = parseInput(res, JoinLobbyBodySchema, req.body, 'join_lobby');
    if (body === undefined) return;

    const result = await lobbies.joinLobby(body.lobby_id, body.player_id);
    metrics.recordOperation('join', result.ok ? 'ok' : result.error.code);
    if (!result.ok) return sendLobbyFailure(res, result.error);

    const lobby = result.value;
    return res.json({
      success: true,
      lobby_id: lobby.id,
      is_host: lobby.hostId === body.player_id,
      player_count: lobby.players.size,
      recommendations: lobby.recommendations,
      selection: lobby.selection,
      location: lobby.location,
      mood: lobby.mood,
    });
  };

  /**
   * Public status of a lobby; never exposes player or host identities.
   */
  const getLobbyInfo = async (req: Request, res: Response) => {
    const lobbyId = parseInput(res, LobbyIdSchema, req.params.lobbyId, 'lobby_info');
    if (lobbyId === undefined) return;

    const summary = await lobbies.getSummary(lobbyId);
    metrics.recordOperation('summary', summary ? 'ok' : 'NOT_FOUND');
    if (!summary) {
      return sendLobbyFailure(res, { code: 'NOT_FOUND', message: 'Lobby not found' });
    }

    return res.json({
      success: true,
      lobby_id: summary.lobbyId,
      player_count: summary.playerCount,
      has_recommendations: summary.hasRecommendations,
      has_selection: summary.hasSelection,
      location: summary.location,
      mood: summary.mood,
    });
  };

  return { createLobby, joinLobby, getLobbyInfo };
}
