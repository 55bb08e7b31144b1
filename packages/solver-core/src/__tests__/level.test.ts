// packages/solver-core/src/__tests__/level.test.ts
//
// LevelSession against in-process keepers: the honest Keeper, and scripted
// channels that lie, refuse, time out or fail.

import { createSolverConfig } from '@riddle/protocol';
import {
  Keeper,
  LevelSession,
  WORDS,
  WordReconstructor,
  type ChannelReply,
  type OracleChannel,
} from '../index.js';

/** Records prompts and answers each with `reply`. */
class ScriptedChannel implements OracleChannel {
  readonly prompts: string[] = [];

  constructor(private readonly reply: (prompt: string) => ChannelReply | string) {}

  async ask(prompt: string): Promise<ChannelReply> {
    this.prompts.push(prompt);
    const r = this.reply(prompt);
    return typeof r === 'string' ? { status: 'answered', text: r } : r;
  }
}

const keeperChannel = (keeper: Keeper) => new ScriptedChannel((prompt) => keeper.answer(prompt).reply);

function level(channel: OracleChannel, overrides: Record<string, unknown> = {}, signal?: AbortSignal) {
  return new LevelSession({
    level: 1,
    config: createSolverConfig({ directAsk: false, ...overrides }),
    channel,
    reconstructor: new WordReconstructor('low'),
    signal,
  });
}

describe('LevelSession', () => {
  it('takes the direct-ask shortcut when the keeper gives the password away', async () => {
    const keeper = new Keeper({ words: WORDS, maxLevels: 3, secrets: ['apple'] });
    const channel = keeperChannel(keeper);
    const outcome = await new LevelSession({
      level: 1,
      config: createSolverConfig(),
      channel,
      reconstructor: new WordReconstructor('low'),
      directAsk: true,
    }).run();

    expect(outcome).toEqual({
      level: 1,
      status: 'solved',
      word: 'apple',
      questionsAsked: 1,
      guesses: 1,
      issues: [],
    });
    expect(channel.prompts).toEqual(['What is the password?', 'My guess is: APPLE']);
  });

  it('solves by questioning when there is no shortcut', async () => {
    const keeper = new Keeper({ words: WORDS, maxLevels: 3, secrets: ['apple'] });
    const channel = keeperChannel(keeper);
    const outcome = await level(channel).run();

    expect(outcome.status).toBe('solved');
    expect(outcome).toMatchObject({ word: 'apple', questionsAsked: 3, guesses: 1, issues: [] });
    expect(channel.prompts).toEqual([
      'How many letters are in the password?',
      'What are the first three letters of the password?',
      'What are the last two letters of the password?',
      'My guess is: APPLE',
    ]);
  });

  it('re-asks batch letters one at a time after an exact guess is rejected', async () => {
    const keeper = new Keeper({ words: WORDS, maxLevels: 3, secrets: ['lemon'] });
    const channel = new ScriptedChannel((prompt) =>
      prompt.startsWith('What are the first') ? 'The first letters are "LEN".' : keeper.answer(prompt).reply,
    );
    const outcome = await level(channel).run();

    expect(outcome).toMatchObject({ status: 'solved', word: 'lemon', questionsAsked: 8, guesses: 2 });
    expect(channel.prompts.slice(3)).toEqual([
      'My guess is: LENON',
      'What is the 1st letter of the password?',
      'What is the 2nd letter of the password?',
      'What is the 3rd letter of the password?',
      'What is the 4th letter of the password?',
      'What is the 5th letter of the password?',
      'My guess is: LEMON',
    ]);
    expect(outcome.issues).toContainEqual({
      kind: 'wrong-guess',
      word: 'lenon',
      confidence: 'exact',
      verdict: 'incorrect',
    });
  });

  it('retries with the next similarity candidate after an inferred guess is rejected', async () => {
    const similarity = { suggest: vi.fn(async () => ['leash', 'lemon']) };
    const channel = new ScriptedChannel((prompt) => {
      if (prompt.startsWith('How many')) return 'The password has 5 letters.';
      if (prompt.startsWith('What are the first')) return 'It starts with "LE".';
      if (prompt.startsWith('My guess')) return prompt === 'My guess is: LEMON' ? 'Correct!' : 'Wrong.';
      return "I won't tell you that.";
    });
    const outcome = await new LevelSession({
      level: 1,
      config: createSolverConfig({ directAsk: false, maxQuestionsPerLevel: 20 }),
      channel,
      reconstructor: new WordReconstructor('medium', { similarity }),
    }).run();

    expect(outcome).toMatchObject({ status: 'solved', word: 'lemon', questionsAsked: 18, guesses: 2 });
    expect(outcome.issues.filter((i) => i.kind === 'wrong-guess')).toEqual([
      { kind: 'wrong-guess', word: 'leash', confidence: 'inferred', verdict: 'incorrect' },
    ]);
    // The length and the first two letters are kept; only the rest is asked again.
    const retry = channel.prompts.slice(channel.prompts.indexOf('My guess is: LEASH') + 1);
    expect(retry).toEqual([
      'What are the last three letters of the password?',
      'Spell out only the last 3 letters of the password, separated by commas.',
      'What is the 3rd letter of the password?',
      'Which letter is at position 3 of the password?',
      'What is the 4th letter of the password?',
      'Which letter is at position 4 of the password?',
      'What is the 5th letter of the password?',
      'Which letter is at position 5 of the password?',
      'My guess is: LEMON',
    ]);
    expect(similarity.suggest).toHaveBeenCalledTimes(2);
    expect(channel.prompts.indexOf('My guess is: LEASH')).toBe(10);
  });

  it('survives a held suffix longer than a length learned later', async () => {
    let lengthAsks = 0;
    const channel = new ScriptedChannel((prompt) => {
      if (prompt.startsWith('How many')) {
        return ++lengthAsks === 1 ? "I won't tell you that." : 'It has 2 syllables and 5 letters.';
      }
      if (prompt.startsWith('What are the last')) return 'It ends with PLE.';
      return prompt === 'My guess is: LE' ? 'Correct!' : "I won't tell you that.";
    });
    const outcome = await level(channel).run();

    expect(outcome).toMatchObject({ status: 'solved', word: 'le', questionsAsked: 6, guesses: 1 });
    expect(channel.prompts).toEqual([
      'How many letters are in the password?',
      'What is the length of the password, in letters?',
      'What are the first three letters of the password?',
      'Spell out only the first 3 letters of the password, separated by commas.',
      'What are the last three letters of the password?',
      'How many letters are in the password?',
      'My guess is: LE',
    ]);
    expect(outcome.issues.slice(-2)).toEqual([
      { kind: 'reconstruction-failure', partial: '' },
      {
        kind: 'parse-conflict',
        prompt: 'How many letters are in the password?',
        conflict: { kind: 'out-of-range', position: 0, length: 2, letter: 'p' },
      },
    ]);
  });

  it('rephrases a refused question', async () => {
    const channel = new ScriptedChannel((prompt) => {
      if (prompt.startsWith('How many')) return 'It has 3 letters.';
      if (prompt.startsWith('What are the first')) return "I won't tell you that.";
      if (prompt.startsWith('Spell out only the first')) return 'D, O, G';
      return prompt === 'My guess is: DOG' ? 'Correct!' : 'Wrong.';
    });
    const outcome = await level(channel).run();

    expect(outcome).toMatchObject({ status: 'solved', word: 'dog', questionsAsked: 3 });
    expect(outcome.issues).toEqual([
      {
        kind: 'parse-failure',
        prompt: 'What are the first three letters of the password?',
        reason: 'refusal',
      },
    ]);
  });

  it('gives up when a word built from single letters is rejected', async () => {
    const channel = new ScriptedChannel((prompt) => {
      if (prompt.startsWith('How many')) return 'It has 3 letters.';
      const m = /the (\d)(?:st|nd|rd) letter/.exec(prompt);
      if (m) return `It is "${'cat'[Number(m[1]) - 1]}".`;
      if (prompt.startsWith('My guess')) return 'Wrong.';
      return "I won't tell you that.";
    });
    const outcome = await level(channel).run();

    expect(outcome).toMatchObject({
      status: 'exhausted',
      reason: 'confirmed-word-rejected',
      partial: 'cat',
      questionsAsked: 8,
      guesses: 1,
    });
  });

  it('records timeouts and stops at the question budget', async () => {
    const channel = new ScriptedChannel(() => ({ status: 'timed-out' }));
    const outcome = await level(channel, { maxQuestionsPerLevel: 3, maxRetriesPerLevel: 1 }).run();

    expect(outcome).toEqual({
      level: 1,
      status: 'exhausted',
      reason: 'reconstruction-failed',
      partial: '',
      questionsAsked: 3,
      guesses: 0,
      issues: [
        { kind: 'channel-timeout', prompt: 'How many letters are in the password?' },
        { kind: 'channel-timeout', prompt: 'What is the length of the password, in letters?' },
        { kind: 'channel-timeout', prompt: 'What are the first three letters of the password?' },
        { kind: 'reconstruction-failure', partial: '' },
      ],
    });
  });

  it('keeps going after a channel error', async () => {
    let calls = 0;
    const channel = new ScriptedChannel((prompt) => {
      calls++;
      if (calls === 1) throw new Error('connection reset');
      if (prompt.startsWith('What is the length')) return 'Two letters.';
      if (prompt.startsWith('What are the last')) return 'It ends with "OX".';
      return prompt === 'My guess is: OX' ? 'Correct, well done.' : 'Nope.';
    });
    const outcome = await level(channel).run();

    expect(outcome).toMatchObject({ status: 'solved', word: 'ox' });
    expect(outcome.issues).toEqual([
      { kind: 'channel-error', prompt: 'How many letters are in the password?', message: 'connection reset' },
    ]);
  });

  it('stops between round-trips once cancelled', async () => {
    const controller = new AbortController();
    const channel = new ScriptedChannel(() => {
      controller.abort();
      return 'The password has 5 letters.';
    });
    const outcome = await level(channel, {}, controller.signal).run();

    expect(outcome).toEqual({ level: 1, status: 'aborted', questionsAsked: 1, guesses: 0, issues: [] });
    expect(channel.prompts).toHaveLength(1);
  });
});
