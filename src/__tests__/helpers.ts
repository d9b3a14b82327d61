import { vi } from 'vitest';
import { ConfigSchema, type Config } from '../shared/config.js';
import { defaultProvidersDir, loadProvidersFromDir } from '../provider/loader.js';
import type { ProviderSpec } from '../provider/schema.js';
import { toBase64 } from '../shared/utils.js';

export type FetchHandler = (url: string, init: RequestInit) => Response | Promise<Response>;

/**
 * Replace global fetch with a router. Every call gets a fresh Response, so
 * handlers must build one per call.
 */
export function stubFetch(handler: FetchHandler) {
  const mock = vi.fn(async (input: RequestInfo | URL, init?: RequestInit) =>
    handler(String(input), init ?? {}),
  );
  vi.stubGlobal('fetch', mock);
  return mock;
}

export function calledUrls(mock: ReturnType<typeof stubFetch>): string[] {
  return mock.mock.calls.map(([input]) => String(input));
}

export function html(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'Content-Type': 'text/html' } });
}

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** A response as if fetch had followed redirects to `finalUrl`. */
export function landedAt(response: Response, finalUrl: string): Response {
  Object.defineProperty(response, 'url', { value: finalUrl });
  return response;
}

/** Never settles until the request's signal aborts. */
export function hang(init: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = init.signal;
    if (!signal) return;
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

export function testConfig(overrides: Record<string, unknown> = {}): Config {
  return ConfigSchema.parse({
    http: { timeout_ms: 200, retries: 0, retry_delay_ms: 0 },
    poll: { interval_ms: 0, max_attempts: 3 },
    redirect: { max_hops: 2 },
    ...overrides,
  });
}

let bundled: ProviderSpec[] | null = null;

export function bundledSpecs(): ProviderSpec[] {
  if (!bundled) bundled = loadProvidersFromDir(defaultProvidersDir());
  return bundled;
}

export function bundledSpec(id: string): ProviderSpec {
  const spec = bundledSpecs().find((s) => s.id === id);
  if (!spec) throw new Error(`No bundled provider ${id}`);
  return spec;
}

/**
 * A landing-page snippet carrying a cipher config. With the defaults the
 * derived token is `abc123-ZBCD`.
 */
export function cipherBlob(fields: Partial<Record<'0' | '1' | '2' | 'f', unknown>> = {}): string {
  const config = {
    '0': toBase64('4,5,6,100'),
    '1': 'abcdefghij',
    '2': 'abc123',
    f: [2, 0, 3, 0, ',', 'Z'],
    ...fields,
  };
  return toBase64(`var gC = ${JSON.stringify(config)};`);
}

export function cipherPage(blob: string = cipherBlob()): string {
  return `<html><head><script>eval(atob('${blob}'));</script></head><body></body></html>`;
}
