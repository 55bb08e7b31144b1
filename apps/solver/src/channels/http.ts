// apps/solver/src/channels/http.ts
//
// Oracle channel backed by the practice server.
//
// The first ask() opens a session (POST /api/session); every prompt after
// that goes to POST /api/ask. A round-trip that exceeds the timeout becomes a
// `timed-out` reply; any other failure throws with the server's text.

import type { ChannelReply, OracleChannel } from '@riddle/solver-core';
import { askRes, newSessionRes, type AskRes, type NewSessionRes } from '@riddle/protocol';
import type { z } from 'zod';

export interface HttpChannelOptions {
  /** Server origin, e.g. http://localhost:3001 (no trailing slash). */
  baseUrl: string;
  seed?: string;
  maxLevels?: number;
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

export class HttpChannel implements OracleChannel {
  private session: NewSessionRes | null = null;
  private last: AskRes | null = null;

  constructor(private readonly options: HttpChannelOptions) {}

  /** Level reported by the server after the latest prompt. */
  get level(): number | undefined {
    return this.last?.level ?? this.session?.level;
  }

  get finished(): boolean {
    return this.last?.finished ?? false;
  }

  async ask(prompt: string, timeoutMs: number): Promise<ChannelReply> {
    const signal = AbortSignal.timeout(timeoutMs);
    try {
      const session = this.session ?? (await this.open(signal));
      this.last = await this.post('/api/ask', { sessionId: session.sessionId, prompt }, askRes, signal);
      return { status: 'answered', text: this.last.reply };
    } catch (err) {
      if (isTimeout(err)) return { status: 'timed-out' };
      throw err;
    }
  }

  private async open(signal: AbortSignal): Promise<NewSessionRes> {
    const body = { seed: this.options.seed, maxLevels: this.options.maxLevels };
    this.session = await this.post('/api/session', body, newSessionRes, signal);
    return this.session;
  }

  /**
   * POST a JSON body and validate the JSON response.
   * @throws Error with the server text if the response is not OK (non-2xx).
   */
  private async post<T>(path: string, body: unknown, schema: z.ZodType<T>, signal: AbortSignal): Promise<T> {
    const res = await fetch(`${this.options.baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal,
    });
    if (!res.ok) throw new Error(`${path} failed with ${res.status}: ${await res.text()}`);
    const json: unknown = await res.json();
    return schema.parse(json);
  }
}
