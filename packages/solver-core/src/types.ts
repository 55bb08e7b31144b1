// packages/solver-core/src/types.ts
//
// Value types shared by the letter state, parser, planner and reconstructor.
// Positions are 1-based everywhere; letters are lowercase a–z.

/** A single structured piece of information about the secret word. */
export type Fact =
  | { kind: 'length'; length: number }
  | { kind: 'substring'; position: number; text: string }
  | { kind: 'letter'; position: number; letter: string }
  /** Letters ending at the last position; resolvable only once the length is known. */
  | { kind: 'suffix'; text: string };

export type MergeOutcome = 'applied' | 'conflict' | 'redundant' | 'deferred';

/**
 * Where a known letter came from:
 *   - "batch":  a first/last-letters reply (several letters in one exchange)
 *   - "single": a letter-at-position reply
 */
export type LetterSource = 'batch' | 'single';

/** A fact that contradicted what was already confirmed. The first value is kept. */
export type ParseConflict =
  | { kind: 'length'; kept: number; rejected: number }
  | { kind: 'letter'; position: number; kept: string; rejected: string }
  | { kind: 'out-of-range'; position: number; length: number; letter: string };

/** The questions the planner can ask. */
export type Question =
  | { kind: 'length' }
  | { kind: 'prefix'; count: number }
  | { kind: 'suffix'; count: number }
  | { kind: 'letter'; position: number };

/** A question bound to one of its phrasings, ready to send. */
export interface PlannedQuestion {
  question: Question;
  variant: number;
  text: string;
}

/** Length plus the fixed letters, e.g. `ap??e`. */
export interface WordPattern {
  length: number;
  letters: ReadonlyMap<number, string>;
}

export type Confidence = 'exact' | 'inferred';

/** Free-form hints picked up from replies, forwarded to the generative oracle. */
export interface WordHints {
  wordType?: 'noun' | 'verb' | 'adjective' | 'adverb';
  category?: string;
}
