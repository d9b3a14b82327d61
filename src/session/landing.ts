import type { HttpClient } from '../http/client.js';
import { providerHost, type ProviderSpec } from '../provider/schema.js';
import type { SessionContext } from './sessionManager.js';

export interface LandingPage {
  url: string;
  html: string;
  cookies: Record<string, string>;
}

/**
 * GET a provider's landing page and keep the cookies it sets.
 */
export async function fetchLandingPage(
  http: HttpClient,
  spec: ProviderSpec,
  signal: AbortSignal,
  url: string = providerHost(spec, 'base'),
): Promise<LandingPage> {
  const response = await http.sendOk({ url, headers: { ...spec.headers } }, signal);
  return {
    url: response.url,
    html: response.body,
    cookies: collectCookies(response.headers),
  };
}

export function collectCookies(headers: Headers): Record<string, string> {
  const cookies: Record<string, string> = {};
  for (const line of headers.getSetCookie()) {
    const pair = line.split(';', 1)[0] ?? '';
    const eq = pair.indexOf('=');
    if (eq <= 0) continue;
    cookies[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
  }
  return cookies;
}

export function cookieHeader(cookies: Readonly<Record<string, string>>): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}

/**
 * Provider default headers plus the session's cookies, if any.
 */
export function sessionHeaders(
  spec: ProviderSpec,
  session: SessionContext | null,
  extra: Record<string, string> = {},
): Record<string, string> {
  const headers: Record<string, string> = { ...spec.headers, ...extra };
  if (session && Object.keys(session.cookies).length > 0) {
    headers['Cookie'] = cookieHeader(session.cookies);
  }
  return headers;
}
