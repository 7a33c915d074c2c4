// Express app factory, exported without listen() for Supertest compatibility
import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';

import { BearerTokenAuthenticator, createAuthenticator } from './auth/authenticators';
import type { Authenticator } from './auth/types';
import type { AppConfig } from './config';
import type { Logger } from './logger';
import { authGate } from './middleware/authGate';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { ScanProxy } from './services/scanProxy';

import healthRouter from './routes/health';
import { createScanRouter } from './routes/scan';
import { createTokenRouter } from './routes/token';

export interface AppDependencies {
  config: AppConfig;
  logger: Logger;
  // Defaults to the one selected by config.auth.mode
  authenticator?: Authenticator;
}

export function createApp({ config, logger, authenticator = createAuthenticator(config, logger) }: AppDependencies): Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigin }));

  // Body parsing; scan payloads can be large
  app.use(express.json({ limit: config.bodyLimit }));
  app.use(express.urlencoded({ extended: false, limit: config.bodyLimit }));

  // Routes
  app.use('/health', healthRouter);

  if (authenticator instanceof BearerTokenAuthenticator) {
    app.use('/token', createTokenRouter(authenticator, logger));
  }

  const proxy = new ScanProxy(config.scanApiUrl, logger);
  app.use('/scan', authGate(authenticator, logger), createScanRouter(proxy, authenticator.scheme));

  // Error handling (must be last)
  app.use(notFoundHandler);
  app.use(errorHandler(logger));

  return app;
}
