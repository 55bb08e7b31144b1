// packages/solver-core/src/oracles.ts
//
// Contracts with the collaborators the core does not implement:
//   • OracleChannel     → sends a prompt to the keeper, returns its reply
//   • SimilarityOracle  → candidate words for a pattern (medium tier)
//   • GenerativeOracle  → one inferred word for a pattern + clues (high tier)
//
// Every call carries the caller's timeout. A channel reports a timeout as a
// value; the oracles may reject, and the reconstructor treats a rejection as
// "no candidate".

import type { WordHints, WordPattern } from './types.js';

export type ChannelReply = { status: 'answered'; text: string } | { status: 'timed-out' };

export interface OracleChannel {
  /** One blocking round-trip; used for questions and for guess submissions. */
  ask(prompt: string, timeoutMs: number): Promise<ChannelReply>;
}

export interface OracleCallOptions {
  timeoutMs: number;
}

export interface SimilarityOracle {
  /** Candidate words for the pattern, best first. */
  suggest(pattern: WordPattern, options: OracleCallOptions): Promise<string[]>;
}

export interface GenerativeClues {
  /** Raw replies gathered during the level, oldest first. */
  replies: readonly string[];
  hints: WordHints;
}

export interface GenerativeOracle {
  infer(pattern: WordPattern, clues: GenerativeClues, options: OracleCallOptions): Promise<string | null>;
}
