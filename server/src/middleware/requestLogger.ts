import pinoHttp from 'pino-http';
import type { Request, Response } from 'express';
import type { Logger } from 'pino';
import '../auth/requestContext';

const DEFAULT_QUIET_PATHS: readonly string[] = ['/api/health'];

export interface RequestLoggerOptions {
  logger: Logger;
  /** Paths served without an access log line. */
  quietPaths?: readonly string[];
}

/**
 * Access log for the API. Request headers are never logged, so bearer
 * tokens stay out of the output; only the user agent is kept.
 */
export function createRequestLogger(options: RequestLoggerOptions) {
  const { logger, quietPaths = DEFAULT_QUIET_PATHS } = options;

  return pinoHttp<Request, Response>({
    logger,

    autoLogging: {
      ignore: (req) => quietPaths.includes(req.originalUrl.split('?')[0]),
    },

    customLogLevel: (_req, res, error) => {
      if (error || res.statusCode >= 500) {
        return 'error';
      }
      return res.statusCode >= 400 ? 'warn' : 'info';
    },

    customProps: (req) => (req.account ? { accountId: req.account.id } : {}),

    serializers: {
      req: (req) => ({
        method: req.method,
        url: req.url,
        userAgent: req.headers['user-agent'],
      }),
      res: (res) => ({
        statusCode: res.statusCode,
      }),
    },
  });
}
