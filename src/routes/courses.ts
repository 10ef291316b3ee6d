// src/routes/courses.ts
// What: GET /api/courses — catalog statistics.

import { Router, type NextFunction, type Request, type Response } from 'express';
import type { RagSystem } from '../services/ragSystem.js';

export function createCoursesRouter(rag: RagSystem): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await rag.courseAnalytics());
    } catch (err) {
      next(err);
    }
  });

  return router;
}
