// packages/solver-core/src/letterState.ts
//
// The evolving partial-word record for one level.
//
// Facts are merged one at a time. A fact that contradicts an already
// confirmed value is rejected (the first value wins) and remembered in
// `conflicts`. The contiguous prefix/suffix runs are derived from the known
// letters and recomputed after every change.
//
// A suffix learned before the length is held as pending text and placed
// once the length arrives.

import type {
  Fact,
  LetterSource,
  MergeOutcome,
  ParseConflict,
  WordPattern,
} from './types.js';

/** Thrown by `asWord()` while positions are still unknown. */
export class IncompleteWordError extends Error {
  constructor(readonly missing: number[]) {
    super(`Word is incomplete; missing positions: ${missing.join(', ') || 'length'}`);
    this.name = 'IncompleteWordError';
  }
}

interface KnownLetter {
  letter: string;
  source: LetterSource;
}

const LETTER = /^[a-z]$/;

function normalizeLetters(text: string): string {
  const lo = text.toLowerCase();
  if (!/^[a-z]+$/.test(lo)) throw new RangeError(`Not a letter sequence: "${text}"`);
  return lo;
}

function assertPosition(position: number): void {
  if (!Number.isInteger(position) || position < 1) {
    throw new RangeError(`Positions are 1-based integers, got ${position}`);
  }
}

/** Folds several per-letter outcomes into one. */
function combine(outcomes: MergeOutcome[]): MergeOutcome {
  if (outcomes.includes('conflict')) return 'conflict';
  if (outcomes.includes('applied')) return 'applied';
  if (outcomes.includes('deferred')) return 'deferred';
  return 'redundant';
}

export class LetterState {
  private wordLength: number | undefined;
  private readonly known = new Map<number, KnownLetter>();
  private pendingSuffixes: string[] = [];
  private prefixRun = 0;
  private suffixRun: number | undefined;

  /** Every rejected fact, oldest first. */
  readonly conflicts: ParseConflict[] = [];

  /** Builds a complete state from a word, every letter confirmed individually. */
  static fromWord(word: string): LetterState {
    const state = new LetterState();
    const letters = normalizeLetters(word);
    state.merge({ kind: 'length', length: letters.length });
    [...letters].forEach((letter, i) => state.merge({ kind: 'letter', position: i + 1, letter }));
    return state;
  }

  get length(): number | undefined {
    return this.wordLength;
  }

  /** Highest position p such that 1..p are all known (0 when position 1 is not). */
  get prefixKnownUpTo(): number {
    return this.prefixRun;
  }

  /**
   * Lowest position s such that s..length are all known; `length + 1` when the
   * last letter is unknown, `undefined` while the length is unknown.
   */
  get suffixKnownFrom(): number | undefined {
    return this.suffixRun;
  }

  /** True while a suffix waits for the length to be learned. */
  get hasPendingSuffix(): boolean {
    return this.pendingSuffixes.length > 0;
  }

  merge(fact: Fact, source: LetterSource = fact.kind === 'letter' ? 'single' : 'batch'): MergeOutcome {
    switch (fact.kind) {
      case 'length':
        return this.mergeLength(fact.length);
      case 'letter':
        return this.mergeLetter(fact.position, fact.letter, source);
      case 'substring': {
        assertPosition(fact.position);
        const text = normalizeLetters(fact.text);
        return combine([...text].map((ch, i) => this.mergeLetter(fact.position + i, ch, source)));
      }
      case 'suffix': {
        const text = normalizeLetters(fact.text);
        if (this.wordLength === undefined) {
          this.pendingSuffixes.push(text);
          return 'deferred';
        }
        return this.placeSuffix(text, this.wordLength);
      }
    }
  }

  letterAt(position: number): string | undefined {
    return this.known.get(position)?.letter;
  }

  sourceAt(position: number): LetterSource | undefined {
    return this.known.get(position)?.source;
  }

  isComplete(): boolean {
    return this.wordLength !== undefined && this.missingPositions().length === 0;
  }

  /** Ascending positions not yet known; empty while the length is unknown. */
  missingPositions(): number[] {
    if (this.wordLength === undefined) return [];
    const missing: number[] = [];
    for (let p = 1; p <= this.wordLength; p++) {
      if (!this.known.has(p)) missing.push(p);
    }
    return missing;
  }

  asWord(): string {
    if (this.wordLength === undefined || !this.isComplete()) {
      throw new IncompleteWordError(this.missingPositions());
    }
    let word = '';
    for (let p = 1; p <= this.wordLength; p++) word += this.known.get(p)?.letter ?? '';
    return word;
  }

  /** Known positions and letters in ascending order. */
  entries(): Array<[position: number, letter: string]> {
    return [...this.known.entries()]
      .sort(([a], [b]) => a - b)
      .map(([p, k]) => [p, k.letter]);
  }

  /** Requires a known length. */
  pattern(): WordPattern {
    if (this.wordLength === undefined) throw new IncompleteWordError([]);
    return { length: this.wordLength, letters: new Map(this.entries()) };
  }

  /**
   * Forgets the letters at the given positions so they can be asked again.
   * Used after a rejected guess that was built only from known letters.
   * Returns how many letters were removed.
   */
  release(positions: Iterable<number>): number {
    let removed = 0;
    for (const p of positions) {
      if (this.known.delete(p)) removed++;
    }
    if (removed > 0) this.recomputeRuns();
    return removed;
  }

  /* ------------------------------------------------------------------------ */

  private mergeLength(length: number): MergeOutcome {
    if (!Number.isInteger(length) || length < 1) {
      throw new RangeError(`Length must be a positive integer, got ${length}`);
    }
    if (this.wordLength !== undefined) {
      if (this.wordLength === length) return 'redundant';
      this.conflicts.push({ kind: 'length', kept: this.wordLength, rejected: length });
      return 'conflict';
    }
    const beyond = [...this.known.keys()].filter((p) => p > length);
    if (beyond.length > 0) {
      this.conflicts.push({ kind: 'length', kept: Math.max(...beyond), rejected: length });
      return 'conflict';
    }

    this.wordLength = length;
    const pending = this.pendingSuffixes;
    this.pendingSuffixes = [];
    for (const text of pending) this.placeSuffix(text, length);
    this.recomputeRuns();
    return 'applied';
  }

  private placeSuffix(text: string, length: number): MergeOutcome {
    const start = length - text.length + 1;
    return combine(
      [...text].map((ch, i): MergeOutcome => {
        const position = start + i;
        // A suffix longer than the word: its leading letters have nowhere to go.
        if (position < 1) {
          this.conflicts.push({ kind: 'out-of-range', position, length, letter: ch });
          return 'conflict';
        }
        return this.mergeLetter(position, ch, 'batch');
      }),
    );
  }

  private mergeLetter(position: number, letter: string, source: LetterSource): MergeOutcome {
    const ch = letter.toLowerCase();
    if (!LETTER.test(ch)) throw new RangeError(`Not a single letter: "${letter}"`);
    assertPosition(position);
    if (this.wordLength !== undefined && position > this.wordLength) {
      this.conflicts.push({ kind: 'out-of-range', position, length: this.wordLength, letter: ch });
      return 'conflict';
    }

    const existing = this.known.get(position);
    if (existing) {
      if (existing.letter === ch) {
        // A direct confirmation upgrades a letter that came from a batch reply.
        if (source === 'single') existing.source = 'single';
        return 'redundant';
      }
      this.conflicts.push({ kind: 'letter', position, kept: existing.letter, rejected: ch });
      return 'conflict';
    }

    this.known.set(position, { letter: ch, source });
    this.recomputeRuns();
    return 'applied';
  }

  private recomputeRuns(): void {
    let p = 0;
    while (this.known.has(p + 1) && (this.wordLength === undefined || p < this.wordLength)) p++;
    this.prefixRun = p;

    if (this.wordLength === undefined) {
      this.suffixRun = undefined;
      return;
    }
    let s = this.wordLength + 1;
    while (s > 1 && this.known.has(s - 1)) s--;
    this.suffixRun = s;
  }
}
