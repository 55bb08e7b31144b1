// packages/solver-core/src/reconstructor.ts
//
// Produces the word to submit from a (possibly incomplete) letter state.
//
// Three interchangeable strategies share one contract:
//   • concatenation (low)    → only succeeds when nothing is missing
//   • similarity    (medium) → first dictionary suggestion agreeing with every known letter
//   • generative    (high)   → an inferred word, accepted only if it agrees as well
//
// The resource tier picks where the chain starts; delegation always runs
// generative → similarity → concatenation and never climbs back up.

import { pino, type Logger } from 'pino';
import type { ResourceTier } from '@riddle/protocol';
import type { LetterState } from './letterState.js';
import type { GenerativeOracle, SimilarityOracle } from './oracles.js';
import { formatPattern, matchesPattern, unknownCount } from './pattern.js';
import type { Confidence, WordHints, WordPattern } from './types.js';

export type StrategyName = 'concatenation' | 'similarity' | 'generative';

export interface ReconstructionContext {
  replies: readonly string[];
  hints: WordHints;
  /** Words already rejected this level. */
  exclude: ReadonlySet<string>;
  timeoutMs: number;
}

export interface ReconstructionStrategy {
  readonly name: StrategyName;
  fill(pattern: WordPattern, ctx: ReconstructionContext): Promise<string | null>;
}

export type Reconstruction =
  | { ok: true; word: string; confidence: Confidence; strategy: StrategyName }
  /** Nothing trustworthy; `partial` is the template with "?" for unknown positions. */
  | { ok: false; partial: string };

/** Lowercase a–z only; the oracles sometimes answer with punctuation or a sentence. */
function firstWord(text: string): string {
  const m = /[A-Za-z]+/.exec(text);
  return m ? m[0].toLowerCase() : '';
}

export class ConcatenationStrategy implements ReconstructionStrategy {
  readonly name = 'concatenation';

  async fill(pattern: WordPattern): Promise<string | null> {
    return unknownCount(pattern) === 0 ? formatPattern(pattern) : null;
  }
}

export class SimilarityStrategy implements ReconstructionStrategy {
  readonly name = 'similarity';

  constructor(
    private readonly oracle: SimilarityOracle,
    private readonly logger: Logger,
  ) {}

  async fill(pattern: WordPattern, ctx: ReconstructionContext): Promise<string | null> {
    let candidates: string[];
    try {
      candidates = await this.oracle.suggest(pattern, { timeoutMs: ctx.timeoutMs });
    } catch (err) {
      this.logger.warn({ err, pattern: formatPattern(pattern) }, 'similarity oracle failed');
      return null;
    }
    const match = candidates
      .map(firstWord)
      .find((w) => matchesPattern(w, pattern) && !ctx.exclude.has(w));
    return match ?? null;
  }
}

export class GenerativeStrategy implements ReconstructionStrategy {
  readonly name = 'generative';

  constructor(
    private readonly oracle: GenerativeOracle,
    private readonly logger: Logger,
  ) {}

  async fill(pattern: WordPattern, ctx: ReconstructionContext): Promise<string | null> {
    let inferred: string | null;
    try {
      inferred = await this.oracle.infer(
        pattern,
        { replies: ctx.replies, hints: ctx.hints },
        { timeoutMs: ctx.timeoutMs },
      );
    } catch (err) {
      this.logger.warn({ err, pattern: formatPattern(pattern) }, 'generative oracle failed');
      return null;
    }
    const word = inferred ? firstWord(inferred) : '';
    if (!matchesPattern(word, pattern) || ctx.exclude.has(word)) {
      this.logger.debug({ inferred, pattern: formatPattern(pattern) }, 'generative answer rejected');
      return null;
    }
    return word;
  }
}

export interface ReconstructorDeps {
  similarity?: SimilarityOracle;
  generative?: GenerativeOracle;
  logger?: Logger;
}

/**
 * The delegation chain for a tier. A tier whose oracle is not configured
 * simply starts further down.
 */
export function strategiesForTier(tier: ResourceTier, deps: ReconstructorDeps = {}): ReconstructionStrategy[] {
  const logger = deps.logger ?? pino({ level: 'silent' });
  const chain: ReconstructionStrategy[] = [];
  if (tier === 'high' && deps.generative) chain.push(new GenerativeStrategy(deps.generative, logger));
  if (tier !== 'low' && deps.similarity) chain.push(new SimilarityStrategy(deps.similarity, logger));
  chain.push(new ConcatenationStrategy());
  return chain;
}

export class WordReconstructor {
  private readonly chain: ReconstructionStrategy[];

  constructor(
    readonly tier: ResourceTier,
    deps: ReconstructorDeps = {},
  ) {
    this.chain = strategiesForTier(tier, deps);
  }

  get strategies(): readonly StrategyName[] {
    return this.chain.map((s) => s.name);
  }

  async reconstruct(state: LetterState, ctx: ReconstructionContext): Promise<Reconstruction> {
    if (state.isComplete()) {
      return { ok: true, word: state.asWord(), confidence: 'exact', strategy: 'concatenation' };
    }
    if (state.length === undefined) return { ok: false, partial: '' };

    const pattern = state.pattern();
    for (const strategy of this.chain) {
      const word = await strategy.fill(pattern, ctx);
      if (word) return { ok: true, word, confidence: 'inferred', strategy: strategy.name };
    }
    return { ok: false, partial: formatPattern(pattern) };
  }
}
