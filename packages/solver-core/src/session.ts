// packages/solver-core/src/session.ts
//
// Plays levels one after another, each with its own LevelSession and a fresh
// letter state; nothing learned on one level carries over to the next.
//
// When a level is abandoned the configured policy decides: "abort" ends the
// run, "restart" replays the level from scratch (up to maxRestarts times).

import { pino, type Logger } from 'pino';
import type { SolverConfig } from '@riddle/protocol';
import { LevelSession, type LevelOutcome } from './level.js';
import type { OracleChannel } from './oracles.js';
import type { WordReconstructor } from './reconstructor.js';

export interface SessionOptions {
  config: SolverConfig;
  channel: OracleChannel;
  reconstructor: WordReconstructor;
  logger?: Logger;
  signal?: AbortSignal;
}

export interface SessionReport {
  /** "completed": every level solved; "failed": a level was abandoned; "aborted": cancelled. */
  status: 'completed' | 'failed' | 'aborted';
  solvedLevels: number;
  outcomes: LevelOutcome[];
}

export async function runSession(options: SessionOptions): Promise<SessionReport> {
  const { config, signal } = options;
  const logger = options.logger ?? pino({ level: 'silent' });
  const outcomes: LevelOutcome[] = [];
  let solvedLevels = 0;

  const report = (status: SessionReport['status']): SessionReport => {
    logger.info({ status, solvedLevels, maxLevels: config.maxLevels }, 'session finished');
    return { status, solvedLevels, outcomes };
  };

  for (let level = 1; level <= config.maxLevels; level++) {
    logger.info({ puzzleLevel: level, tier: config.tier }, 'starting level');
    let restarts = 0;

    for (;;) {
      if (signal?.aborted) return report('aborted');
      const outcome = await new LevelSession({
        level,
        config,
        channel: options.channel,
        reconstructor: options.reconstructor,
        logger,
        signal,
        directAsk: config.directAsk && level === 1 && restarts === 0,
      }).run();
      outcomes.push(outcome);

      if (outcome.status === 'solved') {
        solvedLevels++;
        break;
      }
      if (outcome.status === 'aborted') return report('aborted');

      if (config.onExhausted === 'restart' && restarts < config.maxRestarts) {
        restarts++;
        logger.warn({ puzzleLevel: level, restarts, reason: outcome.reason }, 'restarting level');
        continue;
      }
      return report('failed');
    }
  }

  return report('completed');
}
