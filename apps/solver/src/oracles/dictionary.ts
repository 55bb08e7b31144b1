// apps/solver/src/oracles/dictionary.ts
//
// Similarity oracle over a local word list (medium tier).
//
// Words of the pattern's length are ranked by how well they agree with what
// is known:
//   • every matching known letter     → 3 points
//   • the leading known run, in full  → 2 points per letter
//   • the trailing known run, in full → 2 points per letter
// Ties are broken alphabetically so results are stable.

import { WORDS, type OracleCallOptions, type SimilarityOracle, type WordPattern } from '@riddle/solver-core';

export interface DictionaryOracleOptions {
  words?: readonly string[];
  /** Maximum number of candidates returned. */
  limit?: number;
}

function leadingRun(pattern: WordPattern): string {
  let run = '';
  for (let p = 1; p <= pattern.length; p++) {
    const ch = pattern.letters.get(p);
    if (ch === undefined) break;
    run += ch;
  }
  return run;
}

function trailingRun(pattern: WordPattern): string {
  let run = '';
  for (let p = pattern.length; p >= 1; p--) {
    const ch = pattern.letters.get(p);
    if (ch === undefined) break;
    run = ch + run;
  }
  return run;
}

export function scoreCandidate(word: string, pattern: WordPattern): number {
  let score = 0;
  for (const [p, ch] of pattern.letters) {
    if (word[p - 1] === ch) score += 3;
  }
  const head = leadingRun(pattern);
  if (head && word.startsWith(head)) score += head.length * 2;
  const tail = trailingRun(pattern);
  if (tail && word.endsWith(tail)) score += tail.length * 2;
  return score;
}

export class DictionarySimilarityOracle implements SimilarityOracle {
  private readonly words: readonly string[];
  private readonly limit: number;

  constructor(options: DictionaryOracleOptions = {}) {
    this.words = options.words ?? WORDS;
    this.limit = options.limit ?? 20;
  }

  async suggest(pattern: WordPattern, _options?: OracleCallOptions): Promise<string[]> {
    return this.words
      .filter((w) => w.length === pattern.length)
      .map((word) => ({ word, score: scoreCandidate(word, pattern) }))
      .sort((a, b) => b.score - a.score || a.word.localeCompare(b.word))
      .slice(0, this.limit)
      .map((c) => c.word);
  }
}
