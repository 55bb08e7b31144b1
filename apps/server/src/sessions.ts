// apps/server/src/sessions.ts
//
// In-memory keeper sessions for the practice server.
//
// ⚠️ State lives only in memory; restarting the server loses every session.
// That is fine for practice runs against the solver. A keeper is dropped as
// soon as its last level is cleared; only the finished id is remembered.

import { nanoid } from 'nanoid';
import { Keeper, type KeeperAnswer } from '@riddle/solver-core';

export interface SessionStoreOptions {
  words: readonly string[];
  /** Upper bound for every session; a request may ask for fewer levels. */
  maxLevels: number;
}

export interface CreatedSession {
  sessionId: string;
  level: number;
  maxLevels: number;
}

export type AskResult =
  | ({ ok: true } & KeeperAnswer)
  | { ok: false; error: 'not-found' | 'finished' };

export class SessionStore {
  private readonly sessions = new Map<string, Keeper>();
  private readonly finished = new Set<string>();

  constructor(private readonly options: SessionStoreOptions) {}

  /** Sessions still in play. */
  get size(): number {
    return this.sessions.size;
  }

  create(request: { seed?: string; maxLevels?: number } = {}): CreatedSession {
    const maxLevels = Math.min(request.maxLevels ?? this.options.maxLevels, this.options.maxLevels);
    const sessionId = nanoid();
    const keeper = new Keeper({ words: this.options.words, maxLevels, seed: request.seed });
    this.sessions.set(sessionId, keeper);
    return { sessionId, level: keeper.level, maxLevels };
  }

  ask(sessionId: string, prompt: string): AskResult {
    if (this.finished.has(sessionId)) return { ok: false, error: 'finished' };
    const keeper = this.sessions.get(sessionId);
    if (!keeper) return { ok: false, error: 'not-found' };

    const answer = keeper.answer(prompt);
    if (answer.finished) {
      this.sessions.delete(sessionId);
      this.finished.add(sessionId);
    }
    return { ok: true, ...answer };
  }
}
