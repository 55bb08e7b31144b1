// apps/server/src/__tests__/sessions.test.ts
//
// Unit tests for the in-memory session store behind the practice server.

import { SessionStore } from '../sessions.js';

describe('SessionStore', () => {
  it('creates sessions capped at the server maximum', () => {
    const store = new SessionStore({ words: ['lemon', 'tiger'], maxLevels: 3 });
    const a = store.create();
    const b = store.create({ maxLevels: 10 });
    const c = store.create({ maxLevels: 2, seed: 'daily' });

    expect(a).toMatchObject({ level: 1, maxLevels: 3 });
    expect(b.maxLevels).toBe(3);
    expect(c.maxLevels).toBe(2);
    expect(new Set([a.sessionId, b.sessionId, c.sessionId]).size).toBe(3);
    expect(store.size).toBe(3);
  });

  it('answers prompts for a known session', () => {
    const store = new SessionStore({ words: ['lemon'], maxLevels: 3 });
    const { sessionId } = store.create();
    expect(store.ask(sessionId, 'How many letters are in the password?')).toEqual({
      ok: true,
      reply: 'The password has 5 letters.',
      level: 1,
      finished: false,
    });
  });

  it('reports unknown and finished sessions', () => {
    const store = new SessionStore({ words: ['cat'], maxLevels: 1 });
    const { sessionId } = store.create();

    expect(store.ask('missing', 'hello')).toEqual({ ok: false, error: 'not-found' });
    expect(store.ask(sessionId, 'My guess is: CAT')).toEqual({
      ok: true,
      reply: 'Correct! You have cleared every level.',
      level: 1,
      finished: true,
    });
    expect(store.ask(sessionId, 'What is the password?')).toEqual({ ok: false, error: 'finished' });
  });

  it('drops a keeper once its last level is cleared', () => {
    const store = new SessionStore({ words: ['cat'], maxLevels: 1 });
    const { sessionId } = store.create();
    const other = store.create();
    expect(store.size).toBe(2);

    store.ask(sessionId, 'My guess is: CAT');
    expect(store.size).toBe(1);
    expect(store.ask(sessionId, 'How many letters are in the password?')).toEqual({ ok: false, error: 'finished' });
    expect(store.ask(other.sessionId, 'How many letters are in the password?')).toMatchObject({ ok: true });
  });
});
