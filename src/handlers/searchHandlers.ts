import type { Request, Response } from 'express';
import { LRUCache } from 'lru-cache';
import type { RestaurantRecord } from '@types';
import { SearchBodySchema } from '@utils/validator/lobby.validator.js';
import logger from '@logger';
import {
  RecommendationProviderError,
  type RecommendationProvider,
} from '../services/recommendations/provider.js';
import type { LobbyMetrics } from '../monitoring/metrics.js';
import { parseInput } from './respond.js';

export interface SearchHandlerDeps {
  provider?: RecommendationProvider;
  metrics: LobbyMetrics;
  cacheTtlMs: number;
}

export function createSearchHandlers({ provider, metrics, cacheTtlMs }: SearchHandlerDeps) {
  const cache = new LRUCache<string, RestaurantRecord[]>({
    max: 200,
    ttl: cacheTtlMs,
  });

  const search = async (req: Request, res: Response) => {
    const body = parseInput(res, SearchBodySchema, req.body, 'search');
    if (body === undefined) return;

    if (!provider) {
      return res.status(503).json({ success: false, error: 'Recommendation provider is not configured' });
    }

    const key = `${body.location.toLowerCase()}|${body.mood.toLowerCase()}`;
    let restaurants = cache.get(key);

    if (!restaurants) {
      try {
        restaurants = await provider.fetchRecommendations(body.location, body.mood);
      } catch (err) {
        if (!(err instanceof RecommendationProviderError)) throw err;
        metrics.recordOperation('search', 'provider_error');
        logger.warn('[SEARCH] Provider failed', { location: body.location, mood: body.mood, error: err.message });
        return res.status(502).json({ success: false, error: err.message });
      }
      cache.set(key, restaurants);
    }

    metrics.recordOperation('search', 'ok');
    return res.json({
      success: true,
      location: body.location,
      mood: body.mood,
      restaurants,
    });
  };

  return { search };
}
