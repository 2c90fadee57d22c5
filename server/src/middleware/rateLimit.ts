import rateLimit from 'express-rate-limit';
import type { RateLimitConfig } from '../config';

/**
 * Global per-IP limiter. Disabled in development.
 */
export function createGlobalRateLimit(config: RateLimitConfig, nodeEnv: string) {
  return rateLimit({
    windowMs: config.windowMs,
    max: config.max,
    skip: nodeEnv === 'development' ? () => true : undefined,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later' },
  });
}
