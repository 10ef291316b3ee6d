// src/routes/query.ts
// What: POST /api/query — answer a question about the course materials.
// How: Validates the body with zod, creates a session when none is given, runs one RAG turn and returns the answer
//      with the sources cited during that turn.

import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { RagSystem } from '../services/ragSystem.js';

const schema = z.object({
  query: z.string().trim().min(1).max(4000),
  session_id: z.string().min(1).max(200).nullish(),
});

export function createQueryRouter(rag: RagSystem): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message, code: 'invalid_request' } });
        return;
      }
      const { query } = parsed.data;
      const sessionId = parsed.data.session_id ?? rag.sessions.createSession();

      const { answer, sources } = await rag.query(query, sessionId);
      res.json({ answer, sources, session_id: sessionId });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
