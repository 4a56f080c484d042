import { createServer, type Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../src/app.js';
import { LobbyManager } from '../src/ws/services/lobbyManager.js';
import { LobbyMetrics } from '../src/monitoring/metrics.js';
import {
  RecommendationProviderError,
  type RecommendationProvider,
} from '../src/services/recommendations/provider.js';

describe('HTTP API', () => {
  let lobbies: LobbyManager;
  let server: Server;
  let baseUrl: string;
  let provider: RecommendationProvider | undefined;

  async function boot() {
    lobbies = new LobbyManager();
    const app = createApp({
      lobbies,
      metrics: new LobbyMetrics({ countLobbies: () => lobbies.count() }),
      provider,
      cacheTtlMs: 60_000,
      corsOrigin: '*',
      isProduction: false,
    });
    server = createServer(app);
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server has no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  function post(path: string, body: unknown) {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  beforeEach(async () => {
    provider = undefined;
    await boot();
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  describe('POST /api/lobby/create', () => {
    it('creates a lobby hosted by the caller', async () => {
      const res = await post('/api/lobby/create', { host_id: 'H1' });
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.success).toBe(true);
      expect(body.host_id).toBe('H1');
      expect(body.lobby_id).toMatch(/^[A-Z0-9]{6}$/);
      expect((await lobbies.getLobby(body.lobby_id))?.hostId).toBe('H1');
    });

    it('requires host_id', async () => {
      const res = await post('/api/lobby/create', {});
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body).toMatchObject({ success: false, code: 'INVALID_INPUT' });
      expect(await lobbies.count()).toBe(0);
    });

    it('answers malformed JSON with a 400', async () => {
      const res = await fetch(`${baseUrl}/api/lobby/create`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: '{"host_id":',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ success: false, code: 'INVALID_INPUT', error: 'Malformed JSON body' });
    });
  });

  describe('POST /api/lobby/join', () => {
    it('returns the lobby snapshot to the new player', async () => {
      await lobbies.createLobby('ROOM01', 'H1');
      await lobbies.updateState('ROOM01', 'H1', { location: 'Austin', mood: 'cozy' });

      const res = await post('/api/lobby/join', { lobby_id: ' room01 ', player_id: 'P2' });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        success: true,
        lobby_id: 'ROOM01',
        is_host: false,
        player_count: 2,
        recommendations: [],
        selection: null,
        location: 'Austin',
        mood: 'cozy',
      });
    });

    it('refuses a duplicate join', async () => {
      await lobbies.createLobby('ROOM01', 'H1');
      await post('/api/lobby/join', { lobby_id: 'ROOM01', player_id: 'P2' });

      const res = await post('/api/lobby/join', { lobby_id: 'ROOM01', player_id: 'P2' });

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({ success: false, code: 'ALREADY_MEMBER', error: 'Already in this lobby' });
    });

    it('returns 404 for an unknown lobby', async () => {
      const res = await post('/api/lobby/join', { lobby_id: 'ZZZZZZ', player_id: 'P2' });

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ success: false, code: 'NOT_FOUND', error: 'Lobby not found or expired' });
    });

    it('requires player_id', async () => {
      await lobbies.createLobby('ROOM01', 'H1');
      const res = await post('/api/lobby/join', { lobby_id: 'ROOM01' });

      expect(res.status).toBe(400);
      expect((await res.json()).details).toEqual([
        { field: 'player_id', message: expect.any(String) },
      ]);
    });
  });

  describe('GET /api/lobby/:lobbyId/info', () => {
    it('exposes counts and flags but no identities', async () => {
      await lobbies.createLobby('ROOM01', 'H1');
      await lobbies.updateState('ROOM01', 'H1', { selection: { name: 'Cafe X' } });

      const res = await fetch(`${baseUrl}/api/lobby/room01/info`);
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toEqual({
        success: true,
        lobby_id: 'ROOM01',
        player_count: 1,
        has_recommendations: false,
        has_selection: true,
        location: '',
        mood: '',
      });
      expect(body).not.toHaveProperty('host_id');
    });

    it('returns 404 for an unknown lobby', async () => {
      const res = await fetch(`${baseUrl}/api/lobby/ZZZZZZ/info`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ success: false, code: 'NOT_FOUND', error: 'Lobby not found' });
    });
  });

  describe('POST /api/search', () => {
    it('answers 503 without a provider', async () => {
      const res = await post('/api/search', { location: 'Austin', mood: 'cozy' });
      expect(res.status).toBe(503);
    });

    it('returns provider results and caches them per query', async () => {
      const fetchRecommendations = vi.fn(async (_location: string, _mood: string) => [{ name: 'Cafe X', cuisine: 'Coffee' }]);
      provider = { fetchRecommendations };
      await new Promise<void>((resolve) => server.close(() => resolve()));
      await boot();

      const first = await post('/api/search', { location: 'Austin', mood: 'cozy' });
      const second = await post('/api/search', { location: 'austin', mood: 'COZY' });

      expect(await first.json()).toEqual({
        success: true,
        location: 'Austin',
        mood: 'cozy',
        restaurants: [{ name: 'Cafe X', cuisine: 'Coffee' }],
      });
      expect((await second.json()).restaurants).toEqual([{ name: 'Cafe X', cuisine: 'Coffee' }]);
      expect(fetchRecommendations).toHaveBeenCalledTimes(1);
      expect(fetchRecommendations).toHaveBeenCalledWith('Austin', 'cozy');
    });

    it('maps provider failures to 502', async () => {
      provider = {
        fetchRecommendations: async () => {
          throw new RecommendationProviderError('Recommendation service responded with 500');
        },
      };
      await new Promise<void>((resolve) => server.close(() => resolve()));
      await boot();

      const res = await post('/api/search', { location: 'Austin', mood: 'cozy' });

      expect(res.status).toBe(502);
      expect(await res.json()).toEqual({ success: false, error: 'Recommendation service responded with 500' });
    });

    it('requires both location and mood', async () => {
      const res = await post('/api/search', { location: 'Austin' });
      expect(res.status).toBe(400);
    });
  });

  it('reports health', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect((await res.json()).status).toBe('OK');
  });

  it('exposes the live lobby count as a Prometheus gauge', async () => {
    await lobbies.createLobby('ROOM01', 'H1');
    const res = await fetch(`${baseUrl}/metrics`);
    const text = await res.text();

    expect(res.status).toBe(200);
    expect(text.split('\n')).toContain('lobbies_active 1');
  });

  it('answers unknown routes with JSON 404', async () => {
    const res = await fetch(`${baseUrl}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ success: false, error: 'Not found' });
  });
});
