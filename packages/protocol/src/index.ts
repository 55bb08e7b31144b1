// packages/protocol/src/index.ts
//
// Shared contracts for the solver and the practice server.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - ResourceTier:  reconstruction strength ("low", "medium", "high").
//   - SolverConfig:  the immutable settings a solving session runs with.
//   - Env schemas:   how both apps read their settings from process.env.
//   - Request/response shapes of the practice server.

import { z } from 'zod';

/**
 * Resource tier schema:
 *  - "low"    → concatenate known letters only, never guess
 *  - "medium" → fill gaps from a similarity oracle (dictionary search)
 *  - "high"   → fill gaps from a generative oracle, then fall back to medium
 */
export const RESOURCE_TIERS = ['low', 'medium', 'high'] as const;
export const resourceTierSchema = z.enum(RESOURCE_TIERS);
export type ResourceTier = z.infer<typeof resourceTierSchema>;

/**
 * What the session driver does when a level runs out of retries:
 *  - "abort"   → stop the run and report
 *  - "restart" → replay the level with a fresh letter state
 */
export const exhaustedPolicySchema = z.enum(['abort', 'restart']);
export type ExhaustedPolicy = z.infer<typeof exhaustedPolicySchema>;

/* -------------------------------------------------------------------------- */
/*                               Solver config                                */
/* -------------------------------------------------------------------------- */

/**
 * Settings read once at session start.
 *  - maxQuestionsPerLevel: question budget shared by every sub-round of a level
 *  - maxRetriesPerLevel:   guesses allowed after the first rejected one
 *  - questionTimeoutMs:    per round-trip on the oracle channel
 *  - oracleTimeoutMs:      per similarity/generative oracle call
 *  - prefixThreshold:      minimum word length before "first letters" is asked
 *  - directAsk:            open level 1 with "What is the password?"
 */
export const solverConfigSchema = z.object({
  tier: resourceTierSchema.default('low'),
  maxQuestionsPerLevel: z.number().int().min(1).max(100).default(10),
  maxRetriesPerLevel: z.number().int().min(0).max(100).default(10),
  maxLevels: z.number().int().min(1).max(100).default(7),
  questionTimeoutMs: z.number().int().positive().default(30_000),
  oracleTimeoutMs: z.number().int().positive().default(15_000),
  prefixThreshold: z.number().int().min(0).default(2),
  onExhausted: exhaustedPolicySchema.default('abort'),
  maxRestarts: z.number().int().min(0).default(1),
  directAsk: z.boolean().default(true),
});
export type SolverConfig = Readonly<z.infer<typeof solverConfigSchema>>;

/** Parses a partial config, fills defaults and freezes the result. */
export function createSolverConfig(input: unknown = {}): SolverConfig {
  return Object.freeze(solverConfigSchema.parse(input));
}

/* -------------------------------------------------------------------------- */
/*                               Environment                                  */
/* -------------------------------------------------------------------------- */

const envFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

/** Solver app environment. Numbers arrive as strings and are coerced. */
export const solverEnvSchema = z.object({
  LOG_LEVEL: z.string().default('info'),
  SOLVER_TIER: resourceTierSchema.default('low'),
  SOLVER_MAX_QUESTIONS: z.coerce.number().int().min(1).default(10),
  SOLVER_MAX_RETRIES: z.coerce.number().int().min(0).default(10),
  SOLVER_MAX_LEVELS: z.coerce.number().int().min(1).default(7),
  SOLVER_QUESTION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SOLVER_ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  SOLVER_PREFIX_THRESHOLD: z.coerce.number().int().min(0).default(2),
  SOLVER_ON_EXHAUSTED: exhaustedPolicySchema.default('abort'),
  SOLVER_MAX_RESTARTS: z.coerce.number().int().min(0).default(1),
  SOLVER_DIRECT_ASK: envFlag.default('true'),
  SOLVER_CHANNEL: z.enum(['http', 'manual']).default('http'),
  ORACLE_URL: z.string().url().default('http://localhost:3001'),
  LLM_API_KEY: z.string().min(1).optional(),
  LLM_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  LLM_MODEL: z.string().default('gpt-4o-mini'),
});
export type SolverEnv = z.infer<typeof solverEnvSchema>;

/** Practice server environment. */
export const serverEnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z.string().default('info'),
  KEEPER_MAX_LEVELS: z.coerce.number().int().min(1).default(7),
  WORDS_FILE: z.string().optional(),
});
export type ServerEnv = z.infer<typeof serverEnvSchema>;

/* -------------------------------------------------------------------------- */
/*                           /api/session endpoint                            */
/* -------------------------------------------------------------------------- */

/**
 * Request to start a practice session.
 *  - seed:      optional string for deterministic secret words
 *  - maxLevels: optional cap below the server's KEEPER_MAX_LEVELS
 */
export const newSessionReq = z.object({
  seed: z.string().optional(),
  maxLevels: z.number().int().min(1).max(100).optional(),
});

/**
 * Response to /api/session:
 *  - sessionId: unique session identifier
 *  - level:     current level (1-based)
 *  - maxLevels: number of levels in the session
 */
export const newSessionRes = z.object({
  sessionId: z.string(),
  level: z.number().int().min(1),
  maxLevels: z.number().int().min(1),
});

/* -------------------------------------------------------------------------- */
/*                             /api/ask endpoint                              */
/* -------------------------------------------------------------------------- */

/**
 * Free-text prompt to the keeper. Guesses are prompts too
 * ("My guess is: WORD").
 */
export const askReq = z.object({
  sessionId: z.string(),
  prompt: z.string().min(1).max(500),
});

/**
 * Response to /api/ask:
 *  - reply:    the keeper's prose answer
 *  - level:    level after the prompt (advances on a correct guess)
 *  - finished: true once the last level was solved
 */
export const askRes = z.object({
  reply: z.string(),
  level: z.number().int().min(1),
  finished: z.boolean(),
});

export type NewSessionReq = z.infer<typeof newSessionReq>;
export type NewSessionRes = z.infer<typeof newSessionRes>;
export type AskReq = z.infer<typeof askReq>;
export type AskRes = z.infer<typeof askRes>;
