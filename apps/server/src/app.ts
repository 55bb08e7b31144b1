// apps/server/src/app.ts
//
// Express app for the practice server. Routes:
//   • POST /api/session → start a keeper session
//   • POST /api/ask     → send a prompt (question or guess) to the keeper
//   • GET  /api/health  → liveness
//
// Bodies are validated with the shared zod schemas; invalid bodies get 400
// with the formatted zod error, unknown sessions 404, finished sessions 409.

import express, { type Express } from 'express';
import cors from 'cors';
import type { Logger } from 'pino';
import { askReq, askRes, newSessionReq, newSessionRes } from '@riddle/protocol';
import type { SessionStore } from './sessions.js';

export interface AppDeps {
  sessions: SessionStore;
  log: Logger;
}

export function createApp({ sessions, log }: AppDeps): Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  /* ------------------------------------------------------------------------ */
  /*                                  Routes                                  */
  /* ------------------------------------------------------------------------ */
  app.get('/api/health', (_req, res) => {
    res.json({ ok: true, sessions: sessions.size });
  });

  app.post('/api/session', (req, res) => {
    const parsed = newSessionReq.safeParse(req.body ?? {});
    if (!parsed.success) return res.status(400).json(parsed.error.format());

    const created = sessions.create(parsed.data);
    log.info({ sessionId: created.sessionId, maxLevels: created.maxLevels }, 'session created');
    res.json(newSessionRes.parse(created));
  });

  app.post('/api/ask', (req, res) => {
    const parsed = askReq.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.format());
    const { sessionId, prompt } = parsed.data;

    const result = sessions.ask(sessionId, prompt);
    if (!result.ok) {
      return result.error === 'not-found'
        ? res.status(404).json({ error: 'Session not found' })
        : res.status(409).json({ error: 'Session finished' });
    }

    log.debug({ sessionId, prompt, reply: result.reply, level: result.level }, 'ask');
    res.json(askRes.parse({ reply: result.reply, level: result.level, finished: result.finished }));
  });

  return app;
}
