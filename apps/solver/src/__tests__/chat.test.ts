// apps/solver/src/__tests__/chat.test.ts

import { parsePattern } from '@riddle/solver-core';
import { ChatCompletionOracle, buildInferencePrompt } from '../oracles/chat.js';

const settings = { apiKey: 'test-secret', baseUrl: 'https://llm.test/v1', model: 'test-model' };
const clues = { replies: ['It is a fruit, and a noun.'], hints: { wordType: 'noun' as const } };

describe('buildInferencePrompt', () => {
  it('describes the pattern, hints and replies', () => {
    expect(buildInferencePrompt(parsePattern('ap??e'), clues)).toBe(
      [
        'Find a 5-letter English word matching the template "ap??e" ("?" is an unknown letter).',
        "Known letters: position 1: 'a', position 2: 'p', position 5: 'e'.",
        'The word is a noun.',
        'What the keeper of the word said:',
        '- It is a fruit, and a noun.',
        'Return only the word, nothing else.',
      ].join('\n'),
    );
  });
});

describe('ChatCompletionOracle', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts a chat completion and returns the trimmed answer', async () => {
    const fetchMock = vi.fn(
      async (_url: string, _init?: RequestInit) =>
        new Response(JSON.stringify({ choices: [{ message: { content: ' apple \n' } }] }), { status: 200 }),
    );
    vi.stubGlobal('fetch', fetchMock);

    const word = await new ChatCompletionOracle(settings).infer(parsePattern('ap??e'), clues, { timeoutMs: 1000 });
    expect(word).toBe('apple');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(JSON.parse(String(init?.body))).toMatchObject({ model: 'test-model', temperature: 0 });
  });

  it('returns null for an empty answer', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response(JSON.stringify({ choices: [{ message: { content: null } }] }), { status: 200 })),
    );
    const word = await new ChatCompletionOracle(settings).infer(parsePattern('ap??e'), clues, { timeoutMs: 1000 });
    expect(word).toBeNull();
  });

  it('throws on an error status', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('boom', { status: 500 })));
    await expect(
      new ChatCompletionOracle(settings).infer(parsePattern('ap??e'), clues, { timeoutMs: 1000 }),
    ).rejects.toThrow('Chat completion failed with 500: boom');
  });
});
