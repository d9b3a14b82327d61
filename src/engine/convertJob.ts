import { PollTimeoutError, UpstreamUnavailableError } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import { sleep } from '../shared/utils.js';

/**
 * Call the convert endpoint, following upstream-signalled redirects to a new
 * convert URL at most `maxHops` times.
 */
export async function followConvertRedirects<T>(
  convertUrl: string,
  request: (url: string) => Promise<T>,
  redirectOf: (payload: T) => string | null,
  maxHops: number,
): Promise<T> {
  let url = convertUrl;
  let payload = await request(url);
  let hops = 0;

  for (let next = redirectOf(payload); next !== null; next = redirectOf(payload)) {
    if (hops >= maxHops) {
      throw new UpstreamUnavailableError(`Redirect limit of ${maxHops} exceeded`, {
        lastUrl: url,
      });
    }
    hops++;
    url = next;
    payload = await request(url);
  }

  return payload;
}

export interface PollState {
  progressUrl: string;
  attempt: number;
  maxAttempts: number;
  intervalMs: number;
}

export interface PollOptions<T> {
  progressUrl: string;
  maxAttempts: number;
  intervalMs: number;
  /** One progress check. Throws to abort the loop (e.g. an upstream error code). */
  check: (state: Readonly<PollState>) => Promise<T>;
  isComplete: (payload: T) => boolean;
  signal: AbortSignal;
  log?: Logger;
}

/**
 * Poll until complete. Worst case is `maxAttempts` checks with
 * `maxAttempts - 1` sleeps in between.
 */
export async function pollUntilComplete<T>(options: PollOptions<T>): Promise<T> {
  const state: PollState = {
    progressUrl: options.progressUrl,
    attempt: 0,
    maxAttempts: options.maxAttempts,
    intervalMs: options.intervalMs,
  };

  while (state.attempt < state.maxAttempts) {
    state.attempt++;
    const payload = await options.check(state);
    if (options.isComplete(payload)) {
      options.log?.debug({ attempts: state.attempt }, 'Conversion complete');
      return payload;
    }
    if (state.attempt >= state.maxAttempts) break;

    try {
      await sleep(state.intervalMs, options.signal);
    } catch {
      throw new PollTimeoutError('Deadline exceeded while waiting for conversion', {
        attempts: state.attempt,
      });
    }
  }

  throw new PollTimeoutError(
    `Conversion did not complete after ${state.maxAttempts} progress checks`,
    { attempts: state.attempt, progressUrl: state.progressUrl },
  );
}
