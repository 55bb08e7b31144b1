// packages/solver-core/src/keeper.ts
//
// The keeper: the other side of the game. It guards one secret word per
// level and answers free-text prompts about it in prose.
//
// It is what the practice server hosts, and what the tests play against in
// process. Later levels are harder on purpose:
//   • only level 1 hands the password over when asked directly
//   • from level 3 the plain "What are the first/last N letters" wording is
//     refused; the spelled-out wording still works
//   • from level 4 replies wrap letters in decoy prose
//
// Secrets come from the word list. With a seed the choice is deterministic
// (FNV-1a over "seed:level"); without one it is random.

import { ordinal, parseCount } from './questions.js';

export interface KeeperOptions {
  words: readonly string[];
  maxLevels: number;
  seed?: string;
  /** Fixed secrets per level (index 0 → level 1); overrides the word list. */
  secrets?: readonly string[];
}

export interface KeeperAnswer {
  reply: string;
  /** Level after the prompt; advances on a correct guess. */
  level: number;
  finished: boolean;
}

export const REFUSAL = "I won't tell you that.";

/**
 * Deterministic pick for seeded play: FNV-1a hash of the seed and level,
 * drawn from words long enough for the level.
 */
export function pickSecret(words: readonly string[], level: number, seed?: string): string {
  const minLength = Math.min(3 + level, 8);
  const pool = words.filter((w) => w.length >= minLength);
  const list = pool.length > 0 ? pool : words;
  if (list.length === 0) throw new Error('Keeper needs at least one word');
  if (seed === undefined) return list[Math.floor(Math.random() * list.length)];

  let h = 2166136261;
  for (const ch of `${seed}:${level}`) {
    h ^= ch.charCodeAt(0);
    h = Math.imul(h, 16777619);
  }
  return list[Math.abs(h) % list.length];
}

const spell = (letters: string) => [...letters.toUpperCase()].join(', ');

export class Keeper {
  private currentLevel = 1;
  private done = false;
  private secret: string;

  constructor(private readonly options: KeeperOptions) {
    this.secret = this.secretFor(1);
  }

  get level(): number {
    return this.currentLevel;
  }

  get finished(): boolean {
    return this.done;
  }

  answer(prompt: string): KeeperAnswer {
    const reply = this.done ? 'You have already cleared every level.' : this.reply(prompt.trim());
    return { reply, level: this.currentLevel, finished: this.done };
  }

  /* ------------------------------------------------------------------------ */

  private secretFor(level: number): string {
    const fixed = this.options.secrets?.[level - 1];
    return (fixed ?? pickSecret(this.options.words, level, this.options.seed)).toLowerCase();
  }

  private reply(prompt: string): string {
    const lo = prompt.toLowerCase();
    const level = this.currentLevel;
    const secret = this.secret;

    const guess = /(?:my guess is|the password is|is the password)\s*:?\s*["']?([a-z]+)/.exec(lo);
    if (guess) return this.judge(guess[1]);

    if (/\b(?:what is|tell me) the password\b/.test(lo)) {
      return level === 1 ? `The password is "${secret.toUpperCase()}".` : 'I cannot reveal the password.';
    }

    if (/how many letters|\blength\b/.test(lo)) {
      return level >= 4
        ? `Counting carefully, the word is ${secret.length} letters long.`
        : `The password has ${secret.length} letters.`;
    }

    const batch = /\b(first|last)\s+(\w+\s+)?letters?\b/.exec(lo);
    if (batch) {
      const count = batch[2] ? parseCount(batch[2].trim()) : 1;
      if (count === null || count < 1) return REFUSAL;
      if (level >= 3 && /^what are\b/.test(lo)) return REFUSAL;
      const n = Math.min(count, secret.length);
      return batch[1] === 'first' ? this.describePrefix(secret.slice(0, n)) : this.describeSuffix(secret.slice(-n));
    }

    const single = /(\d+)(?:st|nd|rd|th)\s+letter|position\s+(\d+)/.exec(lo);
    if (single) {
      const position = Number(single[1] ?? single[2]);
      const letter = secret[position - 1];
      if (letter === undefined) return 'The password has no such letter.';
      return level >= 4
        ? `Hmm, I shouldn't, but the ${ordinal(position)} letter is ${letter.toUpperCase()}.`
        : `The ${ordinal(position)} letter is "${letter.toUpperCase()}".`;
    }

    return 'I am the keeper of the password. Ask me something else.';
  }

  private describePrefix(letters: string): string {
    if (this.currentLevel >= 4) {
      return `The word doesn't begin with numbers, but I can say it starts with ${spell(letters)}.`;
    }
    return `The first letters are "${letters.toUpperCase()}".`;
  }

  private describeSuffix(letters: string): string {
    if (this.currentLevel >= 4) return `Fine. It ends with ${spell(letters)}.`;
    return `The last letters are "${letters.toUpperCase()}".`;
  }

  private judge(word: string): string {
    if (word !== this.secret) return 'Wrong. That is not the password.';
    if (this.currentLevel >= this.options.maxLevels) {
      this.done = true;
      return 'Correct! You have cleared every level.';
    }
    this.currentLevel++;
    this.secret = this.secretFor(this.currentLevel);
    return `Correct! Level ${this.currentLevel - 1} cleared.`;
  }
}
