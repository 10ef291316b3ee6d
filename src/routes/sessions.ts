// src/routes/sessions.ts
// What: DELETE /api/sessions/:id — forget a session's conversation history.

import { Router, type Request, type Response } from 'express';
import type { RagSystem } from '../services/ragSystem.js';

export function createSessionsRouter(rag: RagSystem): Router {
  const router = Router();

  router.delete('/:id', (req: Request, res: Response) => {
    const removed = rag.sessions.clearSession(String(req.params.id));
    if (!removed) {
      res.status(404).json({ error: { message: 'session_not_found', code: 'not_found' } });
      return;
    }
    res.status(204).end();
  });

  return router;
}
