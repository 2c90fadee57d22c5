import path from 'path';

export interface RateLimitConfig {
  windowMs: number;
  max: number;
}

/**
 * Process-wide settings, read once at startup.
 */
export interface AppConfig {
  readonly nodeEnv: string;
  readonly port: number;
  readonly databasePath: string;
  readonly corsOrigin: string;
  readonly sessionTtlMs: number;
  readonly rateLimit: Readonly<RateLimitConfig>;
}

const DEFAULT_PORT = 3001;
const DEFAULT_SESSION_TTL_MS = 7 * 24 * 60 * 60 * 1000;

function parseInteger(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return Object.freeze({
    nodeEnv: env.NODE_ENV || 'development',
    port: parseInteger(env.PORT, DEFAULT_PORT, 'PORT'),
    databasePath: env.DATABASE_PATH || path.join(__dirname, '../data/database.sqlite'),
    corsOrigin: env.CORS_ORIGIN || 'http://localhost:3000',
    sessionTtlMs: parseInteger(env.SESSION_TTL_MS, DEFAULT_SESSION_TTL_MS, 'SESSION_TTL_MS'),
    rateLimit: Object.freeze({
      windowMs: parseInteger(env.RATE_LIMIT_WINDOW_MS, 900000, 'RATE_LIMIT_WINDOW_MS'),
      max: parseInteger(env.RATE_LIMIT_MAX, 300, 'RATE_LIMIT_MAX'),
    }),
  });
}

let config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

export function resetConfig(): void {
  config = null;
}
