import type { Config } from '../shared/config.js';
import { ParseError, UpstreamUnavailableError } from '../shared/errors.js';
import { logger as rootLogger, type Logger } from '../shared/logger.js';
import { sleep } from '../shared/utils.js';

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequest {
  url: string;
  method?: HttpMethod;
  query?: Record<string, string>;
  headers?: Record<string, string>;
  form?: Record<string, string>;
  json?: unknown;
  redirect?: 'follow' | 'manual';
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  /** Final URL after any followed redirects. */
  url: string;
  headers: Headers;
  body: string;
}

export interface HttpClientOptions {
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
}

export function httpOptionsFromConfig(config: Config['http']): HttpClientOptions {
  return {
    timeoutMs: config.timeout_ms,
    retries: config.retries,
    retryDelayMs: config.retry_delay_ms,
  };
}

export function buildUrl(url: string, query?: Record<string, string>): string {
  let target: URL;
  try {
    target = new URL(url);
  } catch {
    throw new ParseError(`Invalid request URL: ${url}`, { url });
  }
  for (const [key, value] of Object.entries(query ?? {})) {
    target.searchParams.set(key, value);
  }
  return target.toString();
}

function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
    return `${err.message}${cause}`;
  }
  return String(err);
}

/**
 * The single outbound path to upstream sites. Each call gets its own timeout;
 * timeouts, network failures and 5xx responses are retried up to the budget.
 * Other statuses are handed back so callers can react to 403s and redirects.
 */
export class HttpClient {
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;

  constructor(
    options: HttpClientOptions,
    private readonly log: Logger = rootLogger,
  ) {
    this.timeoutMs = options.timeoutMs;
    this.retries = options.retries;
    this.retryDelayMs = options.retryDelayMs;
  }

  withLogger(log: Logger): HttpClient {
    return new HttpClient(
      { timeoutMs: this.timeoutMs, retries: this.retries, retryDelayMs: this.retryDelayMs },
      log,
    );
  }

  async send(request: HttpRequest, signal?: AbortSignal): Promise<HttpResponse> {
    const method = request.method ?? 'GET';
    const url = buildUrl(request.url, request.query);
    const host = new URL(url).host;
    const init = this.buildInit(request, method);
    const attempts = this.retries + 1;
    let lastError = '';

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (signal?.aborted) throw deadlineError(method, host);

      const timeout = AbortSignal.timeout(this.timeoutMs);
      const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

      try {
        const response = await fetch(url, { ...init, signal: combined });
        const body = await response.text();
        if (response.status < 500) {
          return {
            status: response.status,
            ok: response.ok,
            url: response.url || url,
            headers: response.headers,
            body,
          };
        }
        lastError = `HTTP ${response.status}`;
      } catch (err) {
        if (signal?.aborted) throw deadlineError(method, host);
        lastError = timeout.aborted
          ? `timed out after ${this.timeoutMs}ms`
          : errorMessage(err);
      }

      if (attempt < attempts) {
        this.log.debug({ method, host, attempt, error: lastError }, 'Upstream call failed, retrying');
        try {
          await sleep(this.retryDelayMs, signal);
        } catch {
          throw deadlineError(method, host);
        }
      }
    }

    throw new UpstreamUnavailableError(
      `${method} ${host} failed after ${attempts} attempt(s): ${lastError}`,
      { url, attempts },
    );
  }

  /** Like `send`, but any non-2xx status is an upstream failure. */
  async sendOk(request: HttpRequest, signal?: AbortSignal): Promise<HttpResponse> {
    const response = await this.send(request, signal);
    if (!response.ok) {
      throw new UpstreamUnavailableError(
        `${request.method ?? 'GET'} ${new URL(response.url).host} returned HTTP ${response.status}`,
        { url: response.url, status: response.status },
      );
    }
    return response;
  }

  private buildInit(request: HttpRequest, method: HttpMethod): RequestInit {
    const headers: Record<string, string> = { ...request.headers };
    let body: string | undefined;

    if (request.form) {
      body = new URLSearchParams(request.form).toString();
      if (!hasHeader(headers, 'content-type')) {
        headers['Content-Type'] = 'application/x-www-form-urlencoded';
      }
    } else if (request.json !== undefined) {
      body = JSON.stringify(request.json);
      if (!hasHeader(headers, 'content-type')) {
        headers['Content-Type'] = 'application/json';
      }
    }

    return { method, headers, body, redirect: request.redirect ?? 'follow' };
  }
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  return Object.keys(headers).some((key) => key.toLowerCase() === name);
}

function deadlineError(method: string, host: string): UpstreamUnavailableError {
  return new UpstreamUnavailableError(`Deadline exceeded during ${method} ${host}`, { host });
}

export function parseJsonBody(response: HttpResponse, what: string): unknown {
  try {
    return JSON.parse(response.body) as unknown;
  } catch {
    throw new ParseError(`${what} is not valid JSON`, {
      url: response.url,
      body: response.body.slice(0, 200),
    });
  }
}
