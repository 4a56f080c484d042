import { z } from 'zod';
import type { RestaurantRecord } from '@types';
import { RestaurantSchema } from '@utils/validator/lobby.validator.js';
import logger from '@logger';
import { RecommendationProviderError, type RecommendationProvider } from './provider.js';

const ProviderReplySchema = z.union([
  z.array(RestaurantSchema),
  z.looseObject({ restaurants: z.array(RestaurantSchema) }).transform((reply) => reply.restaurants),
]);

export interface HttpRecommendationProviderOptions {
  url: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

/**
 * Calls an upstream recommendation service that already returns normalized
 * restaurant cards: either a bare array or `{ restaurants: [...] }`.
 */
export class HttpRecommendationProvider implements RecommendationProvider {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpRecommendationProviderOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchRecommendations(location: string, mood: string): Promise<RestaurantRecord[]> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.options.url, {
        method: 'POST',
        headers: { 'content-type': 'application/json', accept: 'application/json' },
        body: JSON.stringify({ location, mood }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      throw new RecommendationProviderError('Recommendation service unreachable', err);
    }

    if (!response.ok) {
      throw new RecommendationProviderError(`Recommendation service responded with ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new RecommendationProviderError('Recommendation service returned invalid JSON', err);
    }

    const parsed = ProviderReplySchema.safeParse(body);
    if (!parsed.success) {
      logger.warn('[RECOMMENDATIONS] Unexpected reply shape', { issues: parsed.error.issues.length });
      throw new RecommendationProviderError('Recommendation service returned an unexpected shape', parsed.error);
    }
    return parsed.data;
  }
}
