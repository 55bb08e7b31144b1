// apps/solver/src/index.ts
//
// Runs a full solving session against the configured keeper.
//
//   SOLVER_CHANNEL=http   → the practice server at ORACLE_URL
//   SOLVER_CHANNEL=manual → prompts on stdout, replies pasted on stdin
//
// The tier decides which oracles are wired in: medium adds the dictionary
// oracle, high adds the chat-completion oracle when LLM_API_KEY is set.
// Ctrl-C cancels between round-trips and still prints the report.
//
// ---------------------------------------------------------------------------

import 'dotenv/config';
import { pino } from 'pino';
import { WordReconstructor, runSession, type OracleChannel } from '@riddle/solver-core';
import { HttpChannel } from './channels/http.js';
import { ManualChannel } from './channels/manual.js';
import { loadSolverSettings } from './config.js';
import { ChatCompletionOracle } from './oracles/chat.js';
import { DictionarySimilarityOracle } from './oracles/dictionary.js';

const settings = loadSolverSettings();
const { config } = settings;
const log = pino({ level: settings.logLevel });

const manual = settings.channel === 'manual' ? new ManualChannel() : null;
const channel: OracleChannel =
  manual ?? new HttpChannel({ baseUrl: settings.oracleUrl, maxLevels: config.maxLevels });

if (config.tier === 'high' && !settings.llm) {
  log.warn('tier "high" without LLM_API_KEY; falling back to the dictionary oracle');
}

const reconstructor = new WordReconstructor(config.tier, {
  similarity: new DictionarySimilarityOracle(),
  generative: settings.llm ? new ChatCompletionOracle(settings.llm) : undefined,
  logger: log,
});

const controller = new AbortController();
process.once('SIGINT', () => {
  log.warn('interrupted; finishing the current round-trip');
  controller.abort();
});

log.info({ config, channel: settings.channel, strategies: reconstructor.strategies }, 'solver starting');

try {
  const report = await runSession({ config, channel, reconstructor, logger: log, signal: controller.signal });
  for (const outcome of report.outcomes) {
    log.info(
      {
        puzzleLevel: outcome.level,
        status: outcome.status,
        word: outcome.status === 'solved' ? outcome.word : undefined,
        questions: outcome.questionsAsked,
        guesses: outcome.guesses,
        issues: outcome.issues.length,
      },
      'level result',
    );
  }
  log.info({ status: report.status, solvedLevels: report.solvedLevels }, 'done');
  process.exitCode = report.status === 'completed' ? 0 : 1;
} finally {
  manual?.close();
}
