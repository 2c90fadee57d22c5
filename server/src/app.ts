import express, { Express } from 'express';
import cors from 'cors';
import { AppConfig } from './config';
import authRouter from './routes/auth';
import healthRouter from './routes/health';
import dataSourcesRouter from './routes/dataSources';
import teamsRouter from './routes/teams';
import accountsRouter from './routes/accounts';
import { errorHandler } from './utils/errors';
import { createSecurityHeaders } from './middleware/securityHeaders';
import { createGlobalRateLimit } from './middleware/rateLimit';
import { createRequestLogger } from './middleware/requestLogger';
import logger from './utils/logger';

/**
 * Build the Express application. Every router except health applies
 * requireAuth itself.
 */
export function createApp(config: AppConfig): Express {
  const app = express();

  app.disable('x-powered-by');

  // Middleware
  app.use(createSecurityHeaders(config.nodeEnv));
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: '100kb' }));
  app.use(createGlobalRateLimit(config.rateLimit, config.nodeEnv));
  app.use(createRequestLogger({ logger }));

  // Public routes
  app.use('/api/health', healthRouter);

  // Protected routes
  app.use('/api/auth', authRouter);
  app.use('/api/data-sources', dataSourcesRouter);
  app.use('/api/teams', teamsRouter);
  app.use('/api/accounts', accountsRouter);

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Catches body-parser errors and anything a handler let through.
  // Must be registered after all routes (Express identifies error handlers by 4-param signature).
  app.use(errorHandler);

  return app;
}
