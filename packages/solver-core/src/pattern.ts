// packages/solver-core/src/pattern.ts
//
// Word patterns: a length plus fixed letters, written as a template such as
// "ap??e". Used to query the similarity/generative oracles and to check that
// a candidate agrees with everything already confirmed.

import type { WordPattern } from './types.js';

export const WILDCARD = '?';

/** Renders the pattern as a template, unknown positions as `wildcard`. */
export function formatPattern(pattern: WordPattern, wildcard = WILDCARD): string {
  let out = '';
  for (let p = 1; p <= pattern.length; p++) out += pattern.letters.get(p) ?? wildcard;
  return out;
}

/** Inverse of formatPattern; any non-letter character counts as unknown. */
export function parsePattern(template: string): WordPattern {
  const letters = new Map<number, string>();
  [...template.toLowerCase()].forEach((ch, i) => {
    if (/^[a-z]$/.test(ch)) letters.set(i + 1, ch);
  });
  return { length: template.length, letters };
}

/** True when `word` has the pattern's length and every fixed letter. */
export function matchesPattern(word: string, pattern: WordPattern): boolean {
  const w = word.toLowerCase();
  if (w.length !== pattern.length || !/^[a-z]+$/.test(w)) return false;
  for (const [p, ch] of pattern.letters) {
    if (w[p - 1] !== ch) return false;
  }
  return true;
}

/** Number of positions still open. */
export function unknownCount(pattern: WordPattern): number {
  return pattern.length - pattern.letters.size;
}
