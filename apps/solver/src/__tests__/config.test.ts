// apps/solver/src/__tests__/config.test.ts
//
// Environment parsing for the solver app.

import { loadSolverSettings } from '../config.js';

describe('loadSolverSettings', () => {
  it('applies defaults to an empty environment', () => {
    const settings = loadSolverSettings({});
    expect(settings.config).toEqual({
      tier: 'low',
      maxQuestionsPerLevel: 10,
      maxRetriesPerLevel: 10,
      maxLevels: 7,
      questionTimeoutMs: 30_000,
      oracleTimeoutMs: 15_000,
      prefixThreshold: 2,
      onExhausted: 'abort',
      maxRestarts: 1,
      directAsk: true,
    });
    expect(Object.isFrozen(settings.config)).toBe(true);
    expect(settings.channel).toBe('http');
    expect(settings.oracleUrl).toBe('http://localhost:3001');
    expect(settings.llm).toBeUndefined();
  });

  it('coerces string variables', () => {
    const settings = loadSolverSettings({
      SOLVER_TIER: 'high',
      SOLVER_MAX_QUESTIONS: '12',
      SOLVER_DIRECT_ASK: 'false',
      SOLVER_ON_EXHAUSTED: 'restart',
      ORACLE_URL: 'http://localhost:4000/',
      LLM_API_KEY: 'test-secret',
    });
    expect(settings.config).toMatchObject({
      tier: 'high',
      maxQuestionsPerLevel: 12,
      directAsk: false,
      onExhausted: 'restart',
    });
    expect(settings.oracleUrl).toBe('http://localhost:4000');
    expect(settings.llm).toEqual({
      apiKey: 'test-secret',
      baseUrl: 'https://api.openai.com/v1',
      model: 'gpt-4o-mini',
    });
  });

  it('rejects an unknown tier', () => {
    expect(() => loadSolverSettings({ SOLVER_TIER: 'extreme' })).toThrow();
  });
});
