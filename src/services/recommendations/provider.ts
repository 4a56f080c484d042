import type { RestaurantRecord } from '@types';

/** Source of restaurant cards for a location and a mood. */
export interface RecommendationProvider {
  fetchRecommendations(location: string, mood: string): Promise<RestaurantRecord[]>;
}

export class RecommendationProviderError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'RecommendationProviderError';
  }
}
