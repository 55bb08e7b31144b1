// packages/solver-core/src/parser.ts
//
// Turns the oracle's free-text replies into facts.
//
// Parsing is context-sensitive: the same reply means different things for
// different questions, so every entry point takes the question that was asked.
// Replies are evasive prose, so extraction is liberal about where letters may
// appear (quotes, spelled-out runs, capitals, "starts with …") but never
// commits a letter that does not literally appear in the reply.
//
// All functions here are pure.

import type { Fact, Question, WordHints } from './types.js';

export type ParseFailureReason = 'empty' | 'refusal' | 'unrecognized';

export type ParseResult =
  | { status: 'parsed'; facts: Fact[] }
  | { status: 'failed'; reason: ParseFailureReason };

export type Verdict = 'correct' | 'incorrect' | 'unknown';

const MAX_WORD_LENGTH = 64;

const DENIAL_PHRASES = [
  'cannot', "can't", 'can not', 'sorry', 'refuse', 'unable', 'not allowed',
  'forbidden', 'restricted', 'apologize', 'regret', 'unfortunately',
  "won't", 'will not', 'not permitted', "mustn't",
];

const NUMBER_WORDS: Record<string, number> = {
  one: 1, two: 2, three: 3, four: 4, five: 5, six: 6, seven: 7, eight: 8, nine: 9, ten: 10,
  eleven: 11, twelve: 12, thirteen: 13, fourteen: 14, fifteen: 15, sixteen: 16,
  seventeen: 17, eighteen: 18, nineteen: 19, twenty: 20,
};

/* -------------------------------------------------------------------------- */
/*                                 Patterns                                   */
/* -------------------------------------------------------------------------- */

const QUOTE = `["'‘’“”\`]`;
const NOT_WORD_BEFORE = `(?<![A-Za-z'’])`;
const NOT_WORD_AFTER = `(?![A-Za-z'’])`;

/** A letter standing alone: "C" in "C, A, T" but not the "c" of "cat". */
const SINGLE = `${NOT_WORD_BEFORE}[A-Za-z]${NOT_WORD_AFTER}`;
const SEPARATOR = String.raw`(?:\s*[,/–-]\s*|\s*(?:\.{1,3}|…)\s*|\s+)(?:(?:and|then)\s+)?`;

const BARE_RUN = /^\s*["'‘“]?([A-Za-z]+)["'’”]?\s*[.!]?\s*$/;
const QUOTED_RUN = new RegExp(`(?<![A-Za-z])${QUOTE}([A-Za-z]+)${QUOTE}(?![A-Za-z])`, 'g');
const SPELLED_RUN = new RegExp(`${SINGLE}(?:${SEPARATOR}${SINGLE})+`, 'g');
const SINGLE_LETTER = new RegExp(SINGLE, 'g');
const UPPERCASE_RUN = new RegExp(`${NOT_WORD_BEFORE}([A-Z]{2,})${NOT_WORD_AFTER}`, 'g');
const CUE_RUN = /\b(?:starts?|begins?|ends?|finish(?:es)?)\s+with\s+(?:the\s+letters?\s+)?([A-Za-z]+)(?![A-Za-z'’])/gi;

const BARE_LETTER = /^\s*["'‘“]?([A-Za-z])["'’”]?\s*[.!]?\s*$/;
const QUOTED_LETTER = new RegExp(`(?<![A-Za-z])${QUOTE}([A-Za-z])${QUOTE}(?![A-Za-z])`, 'g');
const CUE_LETTER = /\b(?:is|letter)\s+(?:an?\s+|the\s+letter\s+)?([A-Za-z])(?=\s*(?:[.!,;)]|$))/gi;
const LONE_CAPITAL = new RegExp(`${NOT_WORD_BEFORE}([A-Z])${NOT_WORD_AFTER}`, 'g');

const DIGITS = /\b(\d{1,3})\b/;
const COUNTED_WORD = new RegExp(
  String.raw`\b(${Object.keys(NUMBER_WORDS).join('|')})[\s-]+(?:letters?|characters?|long)\b`,
  'i',
);

/* -------------------------------------------------------------------------- */
/*                              Extraction helpers                            */
/* -------------------------------------------------------------------------- */

export function isRefusal(reply: string): boolean {
  const lo = reply.toLowerCase().replace(/’/g, "'");
  return DENIAL_PHRASES.some((phrase) => lo.includes(phrase));
}

/** First integer token, or a spelled number followed by "letters". */
export function extractLength(reply: string): number | null {
  const digits = DIGITS.exec(reply);
  if (digits) {
    const n = Number(digits[1]);
    return n >= 1 && n <= MAX_WORD_LENGTH ? n : null;
  }
  const word = COUNTED_WORD.exec(reply);
  return word ? NUMBER_WORDS[word[1].toLowerCase()] ?? null : null;
}

function spelledLetters(run: string): string {
  return (run.match(SINGLE_LETTER) ?? []).join('');
}

type RunStrategy = (reply: string) => string[];

/** Candidate letter runs, best strategy first; each list is in reply order. */
const RUN_STRATEGIES: RunStrategy[] = [
  (reply) => {
    const m = BARE_RUN.exec(reply);
    return m ? [m[1]] : [];
  },
  (reply) => [...reply.matchAll(QUOTED_RUN)].map((m) => m[1]),
  (reply) => [...reply.matchAll(SPELLED_RUN)].map((m) => spelledLetters(m[0])),
  (reply) => [...reply.matchAll(UPPERCASE_RUN)].map((m) => m[1]),
  (reply) => [...reply.matchAll(CUE_RUN)].map((m) => m[1]),
];

/**
 * Finds the first run of letters with 1 ≤ length ≤ maxLength.
 *
 * @example
 *   extractLetterRun("I can say it starts with C, A, T.", 3) // → "cat"
 */
export function extractLetterRun(reply: string, maxLength: number): string | null {
  for (const strategy of RUN_STRATEGIES) {
    const hit = strategy(reply).find((run) => run.length >= 1 && run.length <= maxLength);
    if (hit) return hit.toLowerCase();
  }
  return null;
}

type LetterStrategy = (reply: string) => string[];

const LETTER_STRATEGIES: LetterStrategy[] = [
  (reply) => {
    const m = BARE_LETTER.exec(reply);
    return m ? [m[1]] : [];
  },
  (reply) => [...reply.matchAll(QUOTED_LETTER)].map((m) => m[1]),
  (reply) => [...reply.matchAll(CUE_LETTER)].map((m) => m[1]),
  (reply) =>
    [...reply.matchAll(LONE_CAPITAL)]
      .filter((m) => {
        if (m[1] === 'I') return false; // pronoun
        const rest = reply.slice((m.index ?? 0) + 1);
        return !(m[1] === 'A' && /^\s+[a-z]/.test(rest)); // article
      })
      .map((m) => m[1]),
];

/**
 * Exactly one letter, or null when the reply names none or several.
 * The first strategy that finds anything decides.
 */
export function extractSingleLetter(reply: string): string | null {
  for (const strategy of LETTER_STRATEGIES) {
    const found = new Set(strategy(reply).map((ch) => ch.toLowerCase()));
    if (found.size === 0) continue;
    return found.size === 1 ? [...found][0] : null;
  }
  return null;
}

/* -------------------------------------------------------------------------- */
/*                            Per-question parsers                            */
/* -------------------------------------------------------------------------- */

function failure(reply: string): ParseResult {
  if (reply.trim() === '') return { status: 'failed', reason: 'empty' };
  return { status: 'failed', reason: isRefusal(reply) ? 'refusal' : 'unrecognized' };
}

function parsed(...facts: Fact[]): ParseResult {
  return { status: 'parsed', facts };
}

export function parseLengthReply(reply: string): ParseResult {
  const length = extractLength(reply);
  return length === null ? failure(reply) : parsed({ kind: 'length', length });
}

/**
 * "First k letters": a full run becomes one substring fact; a shorter run
 * still credits the leading letters it confirms.
 */
export function parsePrefixReply(reply: string, count: number): ParseResult {
  if (count === 1) return parseLetterReply(reply, 1);
  const run = extractLetterRun(reply, count);
  if (!run) return failure(reply);
  if (run.length === count) return parsed({ kind: 'substring', position: 1, text: run });
  return parsed(...[...run].map((letter, i): Fact => ({ kind: 'letter', position: i + 1, letter })));
}

/** "Last k letters": placed from the end once the length is known. */
export function parseSuffixReply(reply: string, count: number): ParseResult {
  if (count === 1) {
    const letter = extractSingleLetter(reply);
    return letter ? parsed({ kind: 'suffix', text: letter }) : failure(reply);
  }
  const run = extractLetterRun(reply, count);
  return run ? parsed({ kind: 'suffix', text: run }) : failure(reply);
}

export function parseLetterReply(reply: string, position: number): ParseResult {
  const letter = extractSingleLetter(reply);
  return letter ? parsed({ kind: 'letter', position, letter }) : failure(reply);
}

/** Dispatches on the question that produced the reply. */
export function parseReply(reply: string, question: Question): ParseResult {
  if (reply.trim() === '') return { status: 'failed', reason: 'empty' };
  switch (question.kind) {
    case 'length':
      return parseLengthReply(reply);
    case 'prefix':
      return parsePrefixReply(reply, question.count);
    case 'suffix':
      return parseSuffixReply(reply, question.count);
    case 'letter':
      return parseLetterReply(reply, question.position);
  }
}

/* -------------------------------------------------------------------------- */
/*                          Guesses, openers and hints                        */
/* -------------------------------------------------------------------------- */

const WRONG = /\b(?:incorrect|wrong|not (?:correct|right|the password|it)|try again|nope|denied)\b/i;
const RIGHT = /\b(?:correct|congratulations|well done|you got it|level (?:up|complete|cleared|passed)|access granted|unlocked)\b/i;

/** Reads the reply to a submitted guess. Negative wording wins over positive. */
export function parseVerdict(reply: string): Verdict {
  if (WRONG.test(reply)) return 'incorrect';
  if (RIGHT.test(reply)) return 'correct';
  return 'unknown';
}

const PASSWORD_PATTERNS = [
  /\bpassword(?: you seek)? is (?:none other than )?["'‘“]?([A-Za-z]+)/i,
  /["“]([A-Za-z]{3,})["”]/,
  /(?<![A-Za-z])([A-Z]{4,})(?![A-Za-z])/,
];

/**
 * Pulls a password out of a reply to "What is the password?".
 * Refusals yield nothing; letters outside a–z are dropped.
 */
export function extractPasswordCandidate(reply: string): string | null {
  if (isRefusal(reply)) return null;
  for (const pattern of PASSWORD_PATTERNS) {
    const m = pattern.exec(reply);
    if (!m) continue;
    const word = m[1].toLowerCase().replace(/[^a-z]/g, '');
    if (word) return word;
  }
  return null;
}

const WORD_TYPES = ['noun', 'verb', 'adjective', 'adverb'] as const;
const CATEGORIES = ['animal', 'food', 'color', 'place', 'object', 'person', 'emotion'];

export function extractHints(reply: string): WordHints {
  const lo = reply.toLowerCase();
  const hints: WordHints = {};
  const wordType = WORD_TYPES.find((t) => new RegExp(`\\b${t}\\b`).test(lo));
  if (wordType) hints.wordType = wordType;
  const category = CATEGORIES.find((c) => new RegExp(`\\b${c}s?\\b`).test(lo));
  if (category) hints.category = category;
  return hints;
}
