// packages/solver-core/src/level.ts
//
// Drives one level from the first question to an accepted (or abandoned) guess.
//
//   Asking → Parsing → Merging → Asking … → Reconstructing → Guessing
//     → solved | retry (fresh sub-round) | exhausted
//
// Nothing here throws for an uncooperative oracle. Timeouts, unparseable
// replies, conflicting facts, failed reconstructions and wrong guesses are
// logged and recorded as issues; only running out of retries ends the level
// unsolved. Cancellation is checked between round-trips, never during one.

import { pino, type Logger } from 'pino';
import type { SolverConfig } from '@riddle/protocol';
import { LetterState } from './letterState.js';
import type { ChannelReply, OracleChannel } from './oracles.js';
import {
  extractHints,
  extractPasswordCandidate,
  parseReply,
  parseVerdict,
  type ParseFailureReason,
  type Verdict,
} from './parser.js';
import { formatPattern } from './pattern.js';
import { planNextQuestion } from './planner.js';
import { DIRECT_ASK_PROMPT, QuestionLog, renderGuess } from './questions.js';
import type { WordReconstructor } from './reconstructor.js';
import type { Confidence, Fact, ParseConflict, WordHints } from './types.js';

export type LevelIssue =
  | { kind: 'parse-conflict'; prompt: string; conflict: ParseConflict }
  | { kind: 'parse-failure'; prompt: string; reason: ParseFailureReason }
  | { kind: 'channel-timeout'; prompt: string }
  | { kind: 'channel-error'; prompt: string; message: string }
  | { kind: 'reconstruction-failure'; partial: string }
  | { kind: 'wrong-guess'; word: string; confidence: Confidence; verdict: Verdict };

interface LevelTally {
  level: number;
  questionsAsked: number;
  guesses: number;
  issues: LevelIssue[];
}

export type ExhaustedReason =
  /** Every allowed guess was rejected. */
  | 'retries-exhausted'
  /** The budget ran out before any strategy could produce a word. */
  | 'reconstruction-failed'
  /** A word built only from directly confirmed letters was rejected. */
  | 'confirmed-word-rejected';

export type LevelOutcome =
  | (LevelTally & { status: 'solved'; word: string })
  | (LevelTally & { status: 'exhausted'; reason: ExhaustedReason; partial: string })
  | (LevelTally & { status: 'aborted' });

export interface LevelSessionOptions {
  level: number;
  config: SolverConfig;
  channel: OracleChannel;
  reconstructor: WordReconstructor;
  logger?: Logger;
  signal?: AbortSignal;
  /** Open with "What is the password?" before systematic questioning. */
  directAsk?: boolean;
}

export class LevelSession {
  /** Owned by this session for the level's lifetime; never shared. */
  readonly state = new LetterState();

  private readonly logger: Logger;
  private readonly replies: string[] = [];
  private readonly rejected = new Set<string>();
  private hints: WordHints = {};
  private batchQuestions = true;
  private readonly tally: LevelTally;

  constructor(private readonly options: LevelSessionOptions) {
    this.logger = (options.logger ?? pino({ level: 'silent' })).child({ puzzleLevel: options.level });
    this.tally = { level: options.level, questionsAsked: 0, guesses: 0, issues: [] };
  }

  private get config(): SolverConfig {
    return this.options.config;
  }

  private get aborted(): boolean {
    return this.options.signal?.aborted ?? false;
  }

  async run(): Promise<LevelOutcome> {
    if (this.options.directAsk) {
      const word = await this.tryDirectAsk();
      if (word) return this.solved(word);
    }

    const maxAttempts = this.config.maxRetriesPerLevel + 1;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (this.aborted) return this.abort();
      await this.askRound(new QuestionLog());
      if (this.aborted) return this.abort();

      const result = await this.options.reconstructor.reconstruct(this.state, {
        replies: this.replies,
        hints: this.hints,
        exclude: this.rejected,
        timeoutMs: this.config.oracleTimeoutMs,
      });

      if (!result.ok) {
        this.record({ kind: 'reconstruction-failure', partial: result.partial });
        this.logger.warn({ partial: result.partial, attempt }, 'could not reconstruct the word');
        if (this.tally.questionsAsked >= this.config.maxQuestionsPerLevel) {
          return this.exhausted('reconstruction-failed', result.partial);
        }
        continue;
      }

      const verdict = await this.submit(result.word);
      if (verdict === 'correct') return this.solved(result.word);

      this.rejected.add(result.word);
      this.record({ kind: 'wrong-guess', word: result.word, confidence: result.confidence, verdict });
      this.logger.warn(
        { word: result.word, confidence: result.confidence, strategy: result.strategy, attempt },
        'guess rejected',
      );

      if (result.confidence === 'exact') {
        // Every letter was known, so one of them is wrong. Letters read off a
        // batch reply are the suspects; from here on they are asked one at a time.
        const suspects = this.state
          .entries()
          .map(([p]) => p)
          .filter((p) => this.state.sourceAt(p) === 'batch');
        if (suspects.length === 0) return this.exhausted('confirmed-word-rejected', result.word);
        this.state.release(suspects);
        this.batchQuestions = false;
        this.logger.info({ positions: suspects }, 'released batch letters for re-checking');
      }
    }

    return this.exhausted('retries-exhausted', this.partialWord());
  }

  /* ------------------------------------------------------------------------ */

  /** One sub-round of planner questions, until complete, out of budget or out of ideas. */
  private async askRound(log: QuestionLog): Promise<void> {
    while (
      !this.state.isComplete() &&
      this.tally.questionsAsked < this.config.maxQuestionsPerLevel &&
      !this.aborted
    ) {
      const next = planNextQuestion(this.state, log, {
        prefixThreshold: this.config.prefixThreshold,
        batchQuestions: this.batchQuestions,
      });
      if (!next) break;
      log.record(next);
      this.tally.questionsAsked++;

      const reply = await this.ask(next.text);
      if (reply === null) continue;

      const parsed = parseReply(reply, next.question);
      if (parsed.status === 'failed') {
        this.record({ kind: 'parse-failure', prompt: next.text, reason: parsed.reason });
        this.logger.warn({ prompt: next.text, reply, reason: parsed.reason }, 'no usable fact in reply');
        continue;
      }
      for (const fact of parsed.facts) this.mergeFact(fact, next.text);
    }
  }

  private mergeFact(fact: Fact, prompt: string): void {
    const before = this.state.conflicts.length;
    const outcome = this.state.merge(fact);
    this.logger.debug({ fact, outcome }, 'merged fact');
    for (const conflict of this.state.conflicts.slice(before)) {
      this.record({ kind: 'parse-conflict', prompt, conflict });
      this.logger.warn({ conflict, prompt }, 'conflicting fact ignored; keeping first value');
    }
  }

  /** Sends a prompt; null when no reply text came back. */
  private async ask(prompt: string): Promise<string | null> {
    this.logger.debug({ prompt }, 'asking');
    let reply: ChannelReply;
    try {
      reply = await this.options.channel.ask(prompt, this.config.questionTimeoutMs);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.record({ kind: 'channel-error', prompt, message });
      this.logger.error({ err, prompt }, 'oracle channel failed');
      return null;
    }
    if (reply.status === 'timed-out') {
      this.record({ kind: 'channel-timeout', prompt });
      this.logger.warn({ prompt, timeoutMs: this.config.questionTimeoutMs }, 'oracle timed out');
      return null;
    }

    this.logger.debug({ reply: reply.text }, 'reply');
    this.replies.push(reply.text);
    this.hints = { ...this.hints, ...extractHints(reply.text) };
    return reply.text;
  }

  private async submit(word: string): Promise<Verdict> {
    this.tally.guesses++;
    this.logger.info({ word }, 'submitting guess');
    const reply = await this.ask(renderGuess(word));
    const verdict = reply === null ? 'unknown' : parseVerdict(reply);
    if (verdict === 'unknown') {
      this.logger.warn({ word, reply }, 'unclear verdict; treating the guess as rejected');
    }
    return verdict;
  }

  /** The level-1 shortcut: some keepers simply hand the password over. */
  private async tryDirectAsk(): Promise<string | null> {
    this.tally.questionsAsked++;
    const reply = await this.ask(DIRECT_ASK_PROMPT);
    const candidate = reply === null ? null : extractPasswordCandidate(reply);
    if (!candidate) return null;

    const verdict = await this.submit(candidate);
    if (verdict === 'correct') return candidate;
    this.rejected.add(candidate);
    this.record({ kind: 'wrong-guess', word: candidate, confidence: 'inferred', verdict });
    return null;
  }

  private partialWord(): string {
    return this.state.length === undefined ? '' : formatPattern(this.state.pattern());
  }

  private record(issue: LevelIssue): void {
    this.tally.issues.push(issue);
  }

  private solved(word: string): LevelOutcome {
    this.logger.info({ word, questions: this.tally.questionsAsked, guesses: this.tally.guesses }, 'level solved');
    return { ...this.tally, status: 'solved', word };
  }

  private exhausted(reason: ExhaustedReason, partial: string): LevelOutcome {
    this.logger.warn({ reason, partial }, 'level abandoned');
    return { ...this.tally, status: 'exhausted', reason, partial };
  }

  private abort(): LevelOutcome {
    this.logger.info('level cancelled');
    return { ...this.tally, status: 'aborted' };
  }
}
