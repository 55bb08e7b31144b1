// apps/solver/src/oracles/chat.ts
//
// Generative oracle (high tier) backed by an OpenAI-compatible
// /chat/completions endpoint.
//
// The prompt describes the pattern, any hints picked up from the keeper and
// the most recent raw replies; the model is asked for the word alone. The
// reconstructor checks the answer against the pattern, so nothing here
// validates the word itself.

import { z } from 'zod';
import {
  formatPattern,
  type GenerativeClues,
  type GenerativeOracle,
  type OracleCallOptions,
  type WordPattern,
} from '@riddle/solver-core';
import type { LlmSettings } from '../config.js';

const SYSTEM_PROMPT =
  'You help solve a word-guessing game. Answer with a single lowercase English word and nothing else.';

/** Replies forwarded to the model; older ones are dropped. */
const MAX_REPLIES = 6;

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

export function buildInferencePrompt(pattern: WordPattern, clues: GenerativeClues): string {
  const lines = [
    `Find a ${pattern.length}-letter English word matching the template "${formatPattern(pattern)}" ` +
      `("?" is an unknown letter).`,
  ];
  const known = [...pattern.letters].sort(([a], [b]) => a - b);
  if (known.length > 0) {
    lines.push(`Known letters: ${known.map(([p, ch]) => `position ${p}: '${ch}'`).join(', ')}.`);
  }
  if (clues.hints.wordType) lines.push(`The word is a ${clues.hints.wordType}.`);
  if (clues.hints.category) lines.push(`It is related to: ${clues.hints.category}.`);

  const replies = clues.replies.slice(-MAX_REPLIES);
  if (replies.length > 0) {
    lines.push('What the keeper of the word said:', ...replies.map((r) => `- ${r}`));
  }
  lines.push('Return only the word, nothing else.');
  return lines.join('\n');
}

export class ChatCompletionOracle implements GenerativeOracle {
  constructor(private readonly settings: LlmSettings) {}

  async infer(pattern: WordPattern, clues: GenerativeClues, options: OracleCallOptions): Promise<string | null> {
    const response = await fetch(`${this.settings.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.settings.apiKey}`,
      },
      body: JSON.stringify({
        model: this.settings.model,
        temperature: 0,
        max_tokens: 16,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildInferencePrompt(pattern, clues) },
        ],
      }),
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Chat completion failed with ${response.status}: ${body || response.statusText}`);
    }

    const { choices } = completionSchema.parse(await response.json());
    const content = choices[0].message.content?.trim();
    return content ? content : null;
  }
}
