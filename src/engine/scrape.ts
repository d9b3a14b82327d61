import type { HttpResponse } from '../http/client.js';
import type { ResolutionContext } from '../provider/adapter.js';
import type { SessionContext } from '../session/sessionManager.js';
import { UpstreamUnavailableError } from '../shared/errors.js';

export interface ScrapeResult {
  response: HttpResponse;
  session: SessionContext;
}

export function looksUnauthenticated(response: HttpResponse): boolean {
  return response.status === 401 || response.status === 403;
}

/**
 * Send a session-bound request. A 401/403 invalidates the session and the
 * request is replayed once with a fresh one; a second rejection or any other
 * non-2xx status is an upstream failure.
 */
export async function sendWithSessionRetry(
  ctx: ResolutionContext,
  send: (session: SessionContext) => Promise<HttpResponse>,
): Promise<ScrapeResult> {
  let session = await ctx.acquireSession();
  ctx.state.advance('initiated');
  let response = await send(session);

  if (looksUnauthenticated(response)) {
    ctx.log.info({ status: response.status }, 'Upstream rejected session, refreshing once');
    ctx.invalidateSession(session);
    session = await ctx.acquireSession();
    ctx.state.advance('initiated');
    response = await send(session);
  }

  if (!response.ok) {
    throw new UpstreamUnavailableError(
      `${ctx.spec.name} helper returned HTTP ${response.status}`,
      { url: response.url, status: response.status },
    );
  }

  return { response, session };
}
