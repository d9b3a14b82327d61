import type { ProviderStrategy } from './adapter.js';
import { providerHost } from './schema.js';
import { fetchLandingPage, sessionHeaders } from '../session/landing.js';
import { sendWithSessionRetry } from '../engine/scrape.js';
import { makeFormat } from '../normalize/result.js';
import { absoluteUrl, attrOf, parseHtml, textOf } from '../normalize/html.js';
import { ParseError, UpstreamUnavailableError } from '../shared/errors.js';
import { md5 } from '../shared/utils.js';

export interface SpotifyRaw {
  html: string;
}

/** First hidden input with both a name and a value. */
export function findHiddenToken(html: string): Record<string, string> | null {
  const document = parseHtml(html);
  for (const input of document.querySelectorAll('input[type="hidden"]')) {
    const name = attrOf(input, 'name');
    const value = attrOf(input, 'value');
    if (name && value) return { [name]: value };
  }
  return null;
}

export const spotifyStrategy: ProviderStrategy<SpotifyRaw> = {
  id: 'spotify',

  async bootstrap(spec, http, signal) {
    const page = await fetchLandingPage(http, spec, signal, providerHost(spec, 'landing'));
    const tokens = findHiddenToken(page.html);
    if (!tokens) {
      throw new UpstreamUnavailableError('Form token not found on landing page', { provider: spec.id });
    }
    return { cookies: page.cookies, tokens };
  },

  async orchestrate(ctx) {
    const url = ctx.source.url;
    const base = providerHost(ctx.spec, 'base').replace(/\/+$/, '');
    const { response } = await sendWithSessionRetry(ctx, (session) =>
      ctx.http.send(
        {
          url: `${base}/action`,
          method: 'POST',
          headers: sessionHeaders(ctx.spec, session),
          form: { url, _lvrcs: md5(url), ...session.tokens },
        },
        ctx.signal,
      ),
    );
    return { html: response.body };
  },

  normalize(raw, source) {
    const base = providerHost(source.spec, 'base');
    const document = parseHtml(raw.html);

    for (const anchor of document.querySelectorAll('a[href*="/dl?token="]')) {
      const label = textOf(anchor) ?? '';
      if (label.includes('Cover')) continue;
      const href = absoluteUrl(anchor.getAttribute('href'), base);
      if (!href) continue;
      return {
        title: null,
        author: null,
        thumbnail: null,
        durationSeconds: null,
        formats: [
          makeFormat({
            quality: label || 'mp3',
            container: 'mp3',
            downloadUrl: href,
            hasVideo: false,
            hasAudio: true,
          }),
        ],
      };
    }

    throw new ParseError('No download link found');
  },
};
