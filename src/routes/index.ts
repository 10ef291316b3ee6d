// src/routes/index.ts
// What: Root router composition.
// How: Exposes /health and mounts /api/query, /api/courses and /api/sessions over a shared RagSystem.

import { Router, type Request, type Response } from 'express';
import type { RagSystem } from '../services/ragSystem.js';
import { createCoursesRouter } from './courses.js';
import { createQueryRouter } from './query.js';
import { createSessionsRouter } from './sessions.js';

export function createRouter(rag: RagSystem): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  router.use('/api/query', createQueryRouter(rag));
  router.use('/api/courses', createCoursesRouter(rag));
  router.use('/api/sessions', createSessionsRouter(rag));

  return router;
}
