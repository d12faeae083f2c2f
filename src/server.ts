import express from 'express';
import cors from 'cors';
import type { AppConfig } from './config.js';
import type { Logger } from './logger.js';
import { errorHandler } from './middleware/error.js';
import { createEcgRouter, type EcgBatchEvent } from './routes/ecg.js';
import { SseHub } from './services/sse.js';
import { EcgStore } from './services/store.js';

export function createServer(
  config: AppConfig['server'],
  logger: Logger,
  store = new EcgStore(),
  sse = new SseHub<EcgBatchEvent>()
) {
  const app = express();

  app.disable('x-powered-by');
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: '1mb' }));

  app.get('/healthz', (_req, res) => res.json({ ok: true, records: store.count() }));
  app.use('/api/ecg-data', createEcgRouter(store, sse));

  app.use(errorHandler(logger));
  return { app, store, sse };
}
