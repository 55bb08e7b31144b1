// packages/solver-core/src/questions.ts
//
// Question wording and the per-sub-round log of what was already asked.
//
// Each question category has several phrasings. The keeper may refuse one
// wording and answer another, so a failed question is retried with the next
// phrasing before the planner moves on.

import type { PlannedQuestion, Question } from './types.js';

const ORDINAL_SUFFIXES: Record<number, string> = { 1: 'st', 2: 'nd', 3: 'rd' };
const COUNT_WORDS = ['zero', 'one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine', 'ten'];

/** 1 → "1st", 2 → "2nd", 11 → "11th", 23 → "23rd". */
export function ordinal(n: number): string {
  const mod100 = n % 100;
  if (mod100 >= 10 && mod100 <= 20) return `${n}th`;
  return `${n}${ORDINAL_SUFFIXES[n % 10] ?? 'th'}`;
}

/** 3 → "three"; numbers past ten stay numeric. */
export function countWord(n: number): string {
  return COUNT_WORDS[n] ?? String(n);
}

/** "three" or "3" → 3; anything else → null. */
export function parseCount(token: string): number | null {
  if (/^\d+$/.test(token)) return Number(token);
  const i = COUNT_WORDS.indexOf(token.toLowerCase());
  return i > 0 ? i : null;
}

const PHRASINGS: { [K in Question['kind']]: Array<(q: Extract<Question, { kind: K }>) => string> } = {
  length: [
    () => 'How many letters are in the password?',
    () => 'What is the length of the password, in letters?',
  ],
  prefix: [
    (q) => `What are the first ${countWord(q.count)} letters of the password?`,
    (q) => `Spell out only the first ${q.count} letters of the password, separated by commas.`,
  ],
  suffix: [
    (q) => `What are the last ${countWord(q.count)} letters of the password?`,
    (q) => `Spell out only the last ${q.count} letters of the password, separated by commas.`,
  ],
  letter: [
    (q) => `What is the ${ordinal(q.position)} letter of the password?`,
    (q) => `Which letter is at position ${q.position} of the password?`,
  ],
};

export function phrasingCount(question: Question): number {
  return PHRASINGS[question.kind].length;
}

export function renderQuestion(question: Question, variant = 0): string {
  switch (question.kind) {
    case 'length':
      return PHRASINGS.length[variant % PHRASINGS.length.length](question);
    case 'prefix':
      return PHRASINGS.prefix[variant % PHRASINGS.prefix.length](question);
    case 'suffix':
      return PHRASINGS.suffix[variant % PHRASINGS.suffix.length](question);
    case 'letter':
      return PHRASINGS.letter[variant % PHRASINGS.letter.length](question);
  }
}

/** Stable identity of a question and phrasing, e.g. "letter:4#1". */
export function questionKey(question: Question, variant = 0): string {
  switch (question.kind) {
    case 'length':
      return `length#${variant}`;
    case 'prefix':
    case 'suffix':
      return `${question.kind}:${question.count}#${variant}`;
    case 'letter':
      return `letter:${question.position}#${variant}`;
  }
}

export function plan(question: Question, variant = 0): PlannedQuestion {
  return { question, variant, text: renderQuestion(question, variant) };
}

/** The opener tried before systematic questioning. */
export const DIRECT_ASK_PROMPT = 'What is the password?';

/** How a guess is submitted through the same channel as questions. */
export function renderGuess(word: string): string {
  return `My guess is: ${word.toUpperCase()}`;
}

/**
 * Append-only record of the questions asked in one sub-round.
 * Replaced by a fresh log when a retry sub-round starts.
 */
export class QuestionLog {
  private readonly keys = new Set<string>();

  has(question: Question, variant = 0): boolean {
    return this.keys.has(questionKey(question, variant));
  }

  record(planned: PlannedQuestion): void {
    this.keys.add(questionKey(planned.question, planned.variant));
  }
}
