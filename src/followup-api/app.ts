import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { API_PREFIX } from '@shared/constants';
import type { AppServices } from './middleware/index';
import { errorHandler, requestLogger } from './middleware/index';
import apiRouter from './routes/index';

export interface AppOptions {
  clientUrl: string;
  logRequests?: boolean;
}

export function createApp(services: AppServices, options: AppOptions) {
  const app = express();

  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(cors({ origin: options.clientUrl, credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));
  if (options.logRequests ?? true) app.use(requestLogger);

  app.locals.services = services;
  app.use(API_PREFIX, apiRouter);
  app.use(errorHandler);

  return app;
}
