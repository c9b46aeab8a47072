// Deadline-bounded line read for quick-time prompts (parry)

import { Injectable } from '@nestjs/common';

/** The slice of `readline/promises` Interface this needs */
export interface LineSource {
  question(query: string, options: { signal: AbortSignal }): Promise<string>;
  readonly line: string;
}

@Injectable()
export class TimedInputService {
  /**
   * Resolves with the submitted line, or with whatever was typed so far once
   * `ms` elapses. Never retries.
   */
  async readWithTimeout(source: LineSource, prompt: string, ms: number): Promise<string> {
    const signal = AbortSignal.timeout(ms);
    try {
      return await source.question(prompt, { signal });
    } catch (err) {
      if (signal.aborted) return source.line;
      throw err;
    }
  }
}
