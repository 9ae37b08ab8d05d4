import express from 'express';
import cors from 'cors';
import pinoHttp from 'pino-http';
import { config } from './config.js';
import { logger } from './logger.js';
import analysisRoutes from './routes/analysisRoutes.js';
import healthRoutes from './routes/healthRoutes.js';
import { errorHandler, notFound } from './middleware/errorHandler.js';

export function createApp(): express.Express {
  const app = express();
  app.use(pinoHttp({ logger }));
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: config.http.bodyLimit }));

  app.use(healthRoutes);
  app.use(analysisRoutes);

  app.use(notFound);
  app.use(errorHandler);
  return app;
}
