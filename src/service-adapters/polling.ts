/**
 * Growth-then-stability polling for streamed responses
 */

import { CancelledError, TimeoutError } from '../errors/index.js';
import { sleep } from '../locks/index.js';

export interface PollOptions {
  intervalMs: number;
  /** Consecutive unchanged polls required before the response counts as done */
  stablePolls: number;
  timeoutMs: number;
  signal?: AbortSignal;
  /** Clock and delay overrides for tests */
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface PollResult {
  text: string;
  polls: number;
}

/**
 * Poll a growing response until it has not changed for N polls
 *
 * Empty reads never count towards stability. Cancellation is checked at
 * every poll boundary.
 *
 * @param read - Returns the response text seen so far (null when nothing yet)
 * @throws TimeoutError when timeoutMs passes first
 * @throws CancelledError when the signal aborts
 */
export async function pollUntilStable(
  read: (signal?: AbortSignal) => Promise<string | null>,
  options: PollOptions
): Promise<PollResult> {
  const now = options.now ?? Date.now;
  const wait = options.sleep ?? sleep;
  const startedAt = now();

  let previous: string | null = null;
  let unchanged = 0;
  let polls = 0;

  for (;;) {
    if (options.signal?.aborted) {
      throw new CancelledError();
    }

    const text = (await read(options.signal)) ?? '';
    polls += 1;

    if (text.length > 0 && text === previous) {
      unchanged += 1;
    } else {
      unchanged = 0;
    }
    previous = text;

    if (unchanged >= options.stablePolls) {
      return { text, polls };
    }

    if (now() - startedAt >= options.timeoutMs) {
      throw new TimeoutError(
        `Response not stable after ${options.timeoutMs}ms (${polls} polls)`,
        options.timeoutMs
      );
    }

    await wait(options.intervalMs, options.signal);
  }
}
