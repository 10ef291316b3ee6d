// src/app.ts
// What: Express application factory.
// How: JSON body limit, route composition over a RagSystem, and a centralized error handler returning
//      { error: { message, code? } } with the error's status (default 500).

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import logger from './logging.js';
import { createRouter } from './routes/index.js';
import type { RagSystem } from './services/ragSystem.js';

function errorField(err: unknown, field: 'status' | 'code'): unknown {
  return typeof err === 'object' && err !== null && field in err ? Reflect.get(err, field) : undefined;
}

export function createApp(rag: RagSystem): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));

  app.use('/', createRouter(rag));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const rawStatus = errorField(err, 'status');
    const rawCode = errorField(err, 'code');
    const status = typeof rawStatus === 'number' && rawStatus >= 400 && rawStatus < 600 ? rawStatus : 500;
    const code = typeof rawCode === 'string' ? rawCode : undefined;
    const message = err instanceof Error ? err.message : 'Internal Server Error';
    logger.error({ err, status, code }, 'Unhandled error');
    res.status(status).json({ error: { message, code } });
  });

  return app;
}
