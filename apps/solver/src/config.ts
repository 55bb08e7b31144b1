// apps/solver/src/config.ts
//
// Environment → settings. Everything the run needs is read here, once, and
// handed on as plain values; nothing downstream reads process.env.

import { createSolverConfig, solverEnvSchema, type SolverConfig } from '@riddle/protocol';

export interface LlmSettings {
  apiKey: string;
  baseUrl: string;
  model: string;
}

export interface SolverSettings {
  logLevel: string;
  config: SolverConfig;
  channel: 'http' | 'manual';
  oracleUrl: string;
  /** Present only when LLM_API_KEY is set. */
  llm?: LlmSettings;
}

/**
 * Validates the environment and builds the frozen solver config.
 * Throws a ZodError naming every invalid variable.
 */
export function loadSolverSettings(env: NodeJS.ProcessEnv = process.env): SolverSettings {
  const e = solverEnvSchema.parse(env);
  const config = createSolverConfig({
    tier: e.SOLVER_TIER,
    maxQuestionsPerLevel: e.SOLVER_MAX_QUESTIONS,
    maxRetriesPerLevel: e.SOLVER_MAX_RETRIES,
    maxLevels: e.SOLVER_MAX_LEVELS,
    questionTimeoutMs: e.SOLVER_QUESTION_TIMEOUT_MS,
    oracleTimeoutMs: e.SOLVER_ORACLE_TIMEOUT_MS,
    prefixThreshold: e.SOLVER_PREFIX_THRESHOLD,
    onExhausted: e.SOLVER_ON_EXHAUSTED,
    maxRestarts: e.SOLVER_MAX_RESTARTS,
    directAsk: e.SOLVER_DIRECT_ASK,
  });

  return {
    logLevel: e.LOG_LEVEL,
    config,
    channel: e.SOLVER_CHANNEL,
    oracleUrl: e.ORACLE_URL.replace(/\/+$/, ''),
    llm: e.LLM_API_KEY
      ? { apiKey: e.LLM_API_KEY, baseUrl: e.LLM_BASE_URL.replace(/\/+$/, ''), model: e.LLM_MODEL }
      : undefined,
  };
}
