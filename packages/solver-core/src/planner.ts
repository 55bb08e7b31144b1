// packages/solver-core/src/planner.ts
//
// Chooses the next question from what is known so far.
//
// Priority:
//   1. the length, while unknown
//   2. the first min(3, length) letters, while no leading letter is known
//      and the word is longer than the prefix threshold
//   3. the last min(3, length − prefixKnownUpTo) letters, while no trailing
//      letter is known
//   4. each missing position, ascending, one per call
//   5. nothing (the state is complete)
//
// Batch questions are only proposed while they can still reveal two or more
// unknown letters in one exchange. A question and phrasing already in the
// log is never proposed again; the next phrasing of the same question is
// tried first. With `batchQuestions: false` steps 2 and 3 are skipped.
// The question budget belongs to the caller.

import type { LetterState } from './letterState.js';
import { phrasingCount, plan, type QuestionLog } from './questions.js';
import type { PlannedQuestion, Question } from './types.js';

export interface PlannerOptions {
  /** "First letters" is only asked for words longer than this. */
  prefixThreshold?: number;
  /** False once batch replies proved unreliable; only single letters are asked. */
  batchQuestions?: boolean;
}

const BATCH_SIZE = 3;
const DEFAULT_PREFIX_THRESHOLD = 2;

/** First phrasing of `question` not yet in the log. */
function unasked(question: Question, log: QuestionLog): PlannedQuestion | null {
  for (let variant = 0; variant < phrasingCount(question); variant++) {
    if (!log.has(question, variant)) return plan(question, variant);
  }
  return null;
}

function unknownIn(state: LetterState, from: number, to: number): number {
  let n = 0;
  for (let p = from; p <= to; p++) if (state.letterAt(p) === undefined) n++;
  return n;
}

/**
 * planNextQuestion is a pure function of the letter state and the questions
 * already asked in the current sub-round.
 *
 * @returns the next question to ask, or null when there is nothing left worth
 *          asking
 */
export function planNextQuestion(
  state: LetterState,
  log: QuestionLog,
  options: PlannerOptions = {},
): PlannedQuestion | null {
  const threshold = options.prefixThreshold ?? DEFAULT_PREFIX_THRESHOLD;
  const batches = options.batchQuestions ?? true;
  const length = state.length;

  if (length === undefined) {
    // Without a length the only other useful questions are the two batches;
    // a suffix learned now is held until the length arrives.
    const lengthQuestion = unasked({ kind: 'length' }, log);
    if (lengthQuestion || !batches) return lengthQuestion;
    return (
      (state.prefixKnownUpTo === 0 ? unasked({ kind: 'prefix', count: BATCH_SIZE }, log) : null) ??
      (state.hasPendingSuffix ? null : unasked({ kind: 'suffix', count: BATCH_SIZE }, log))
    );
  }

  const missing = state.missingPositions();
  if (missing.length === 0) return null;

  if (batches && state.prefixKnownUpTo === 0 && length > threshold) {
    const count = Math.min(BATCH_SIZE, length);
    if (unknownIn(state, 1, count) >= 2) {
      const q = unasked({ kind: 'prefix', count }, log);
      if (q) return q;
    }
  }

  if (batches && state.letterAt(length) === undefined) {
    const count = Math.min(BATCH_SIZE, length - state.prefixKnownUpTo);
    if (count >= 2 && unknownIn(state, length - count + 1, length) >= 2) {
      const q = unasked({ kind: 'suffix', count }, log);
      if (q) return q;
    }
  }

  for (const position of missing) {
    const q = unasked({ kind: 'letter', position }, log);
    if (q) return q;
  }
  return null;
}
