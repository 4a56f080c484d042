import { rateLimit } from 'express-rate-limit';

// Limiter globalny dla całego API
export const createGlobalLimiter = () =>
  rateLimit({
    windowMs: 60 * 1000, // 1 minuta
    limit: 120,
    standardHeaders: true, // zwraca limit info w headerach `RateLimit-*`
    legacyHeaders: false, // wyłącza X-RateLimit-*
    message: {
      success: false,
      error: 'Too many requests, please try again later.',
    },
  });
