import { describe, it, expect } from 'vitest';
import { followConvertRedirects, pollUntilComplete } from '../convertJob.js';
import { ConversionError, PollTimeoutError, UpstreamUnavailableError } from '../../shared/errors.js';

interface Step {
  redirect: string | null;
}

describe('followConvertRedirects', () => {
  it('returns the first payload without a redirect', async () => {
    const urls: string[] = [];
    const payload = await followConvertRedirects<Step>(
      'https://c.test/0',
      async (url) => {
        urls.push(url);
        return { redirect: urls.length < 3 ? `https://c.test/${urls.length}` : null };
      },
      (p) => p.redirect,
      5,
    );
    expect(payload.redirect).toBeNull();
    expect(urls).toEqual(['https://c.test/0', 'https://c.test/1', 'https://c.test/2']);
  });

  it('stops after maxHops redirects', async () => {
    let requests = 0;
    const pending = followConvertRedirects<Step>(
      'https://c.test/0',
      async () => {
        requests++;
        return { redirect: 'https://c.test/again' };
      },
      (p) => p.redirect,
      2,
    );

    await expect(pending).rejects.toThrow(new UpstreamUnavailableError('Redirect limit of 2 exceeded'));
    expect(requests).toBe(3);
  });
});

describe('pollUntilComplete', () => {
  const signal = new AbortController().signal;

  it('returns as soon as a check reports completion', async () => {
    let checks = 0;
    const result = await pollUntilComplete({
      progressUrl: 'https://p.test',
      maxAttempts: 5,
      intervalMs: 0,
      signal,
      check: async () => ({ progress: ++checks }),
      isComplete: (p) => p.progress >= 3,
    });
    expect(result).toEqual({ progress: 3 });
    expect(checks).toBe(3);
  });

  it('makes exactly maxAttempts checks before timing out', async () => {
    const attempts: number[] = [];
    const pending = pollUntilComplete({
      progressUrl: 'https://p.test',
      maxAttempts: 4,
      intervalMs: 0,
      signal,
      check: async (state) => {
        attempts.push(state.attempt);
        return { progress: 1 };
      },
      isComplete: (p) => p.progress >= 3,
    });

    await expect(pending).rejects.toThrow(
      new PollTimeoutError('Conversion did not complete after 4 progress checks'),
    );
    expect(attempts).toEqual([1, 2, 3, 4]);
  });

  it('propagates an error raised by a check', async () => {
    const pending = pollUntilComplete({
      progressUrl: 'https://p.test',
      maxAttempts: 5,
      intervalMs: 0,
      signal,
      check: async () => {
        throw new ConversionError('Upstream conversion failed with error code 2');
      },
      isComplete: () => false,
    });
    await expect(pending).rejects.toBeInstanceOf(ConversionError);
  });

  it('times out when the deadline fires between checks', async () => {
    let checks = 0;
    const pending = pollUntilComplete({
      progressUrl: 'https://p.test',
      maxAttempts: 10,
      intervalMs: 10_000,
      signal: AbortSignal.timeout(20),
      check: async () => {
        checks++;
        return { progress: 0 };
      },
      isComplete: () => false,
    });

    await expect(pending).rejects.toThrow('Deadline exceeded while waiting for conversion');
    expect(checks).toBe(1);
  });
});
