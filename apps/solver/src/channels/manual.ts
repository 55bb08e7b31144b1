// apps/solver/src/channels/manual.ts
//
// Copy/paste channel: prints each prompt and waits for the keeper's reply to
// be pasted back on one line. Useful against a keeper the solver cannot reach
// programmatically.
//
// An empty line is passed through as an empty reply (the parser treats it as
// a failed reply); no input before the timeout is a `timed-out` reply.

import { createInterface, type Interface } from 'node:readline/promises';
import type { ChannelReply, OracleChannel } from '@riddle/solver-core';

export interface ManualChannelOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export class ManualChannel implements OracleChannel {
  private readonly rl: Interface;

  constructor(options: ManualChannelOptions = {}) {
    this.rl = createInterface({
      input: options.input ?? process.stdin,
      output: options.output ?? process.stdout,
      terminal: false,
    });
  }

  async ask(prompt: string, timeoutMs: number): Promise<ChannelReply> {
    try {
      const text = await this.rl.question(`\n>>> ${prompt}\n<<< `, { signal: AbortSignal.timeout(timeoutMs) });
      return { status: 'answered', text: text.trim() };
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') return { status: 'timed-out' };
      throw err;
    }
  }

  close(): void {
    this.rl.close();
  }
}
