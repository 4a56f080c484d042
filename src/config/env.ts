import { cleanEnv, str, num, url } from 'envalid';

export const env = cleanEnv(process.env, {
  // SERVER
  PORT: num({ default: 5000 }),
  NODE_ENV: str({ choices: ['development', 'production', 'test'], default: 'development' }),
  LOG_LEVEL: str({ choices: ['error', 'warn', 'info', 'http', 'verbose', 'debug'], default: 'info' }),

  // CORS
  CORS_ORIGIN: str({ default: '*' }),

  // LOBBIES
  LOBBY_EXPIRATION_MINUTES: num({ default: 30 }),
  LOBBY_SWEEP_INTERVAL_SECONDS: num({ default: 60 }),

  // RECOMMENDATIONS
  RECOMMENDER_URL: url({ default: undefined }),
  RECOMMENDER_TIMEOUT_MS: num({ default: 20_000 }),
  SEARCH_CACHE_TTL_SECONDS: num({ default: 300 }),
});
