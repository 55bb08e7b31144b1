// apps/server/src/index.ts
//
// Practice server: hosts keeper sessions over HTTP so the solver can play a
// full game end to end without the real game in the loop.
//
// Responsibilities:
//   • Read settings from the environment (PORT, LOG_LEVEL, KEEPER_MAX_LEVELS,
//     WORDS_FILE).
//   • Load the word list the keeper draws secrets from.
//   • Serve the routes defined in app.ts.
//
// ---------------------------------------------------------------------------

import 'dotenv/config';
import { pino } from 'pino';
import { serverEnvSchema } from '@riddle/protocol';
import { WORDS, loadWordList } from '@riddle/solver-core';
import { createApp } from './app.js';
import { SessionStore } from './sessions.js';

const env = serverEnvSchema.parse(process.env);
const log = pino({ level: env.LOG_LEVEL });

/* -------------------------------------------------------------------------- */
/*                           Dictionary initialization                        */
/* -------------------------------------------------------------------------- */
// WORDS_FILE replaces the bundled list; a bad file stops the boot.
const words = env.WORDS_FILE ? loadWordList(env.WORDS_FILE) : [...WORDS];
log.info({ words: words.length, source: env.WORDS_FILE ?? 'bundled' }, 'word list loaded');

const sessions = new SessionStore({ words, maxLevels: env.KEEPER_MAX_LEVELS });
const app = createApp({ sessions, log });

/* -------------------------------------------------------------------------- */
/*                                   Boot                                     */
/* -------------------------------------------------------------------------- */
app.listen(env.PORT, () => log.info({ port: env.PORT }, 'server up'));
