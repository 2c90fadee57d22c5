import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const VALID_LOG_LEVELS: readonly LogLevel[] = [
  'fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent',
];

/**
 * Paths that must never reach a log line. Connection configs carry
 * database passwords.
 */
export const REDACTED_LOG_PATHS = [
  'password',
  'config.password',
  '*.config.password',
  'req.headers.authorization',
];

export function parseLogLevel(envValue: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  if (!envValue) return fallback;
  const normalized = envValue.toLowerCase().trim();
  return VALID_LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const nodeEnv = process.env.NODE_ENV;
  const isTest = nodeEnv === 'test';
  const level = options.level ?? parseLogLevel(process.env.LOG_LEVEL, isTest ? 'silent' : 'info');
  const pretty = options.pretty ?? (nodeEnv !== 'production' && !isTest);

  const transport = pretty
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l' } }
    : undefined;

  return pino({
    level,
    transport,
    redact: { paths: REDACTED_LOG_PATHS, censor: '[REDACTED]' },
  });
}

const logger = createLogger();

export default logger;
