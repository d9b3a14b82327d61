import type { ProviderStrategy } from './adapter.js';
import { providerHost } from './schema.js';
import { fetchLandingPage, sessionHeaders } from '../session/landing.js';
import { sendWithSessionRetry } from '../engine/scrape.js';
import { makeFormat, type FormatVariant } from '../normalize/result.js';
import { absoluteUrl, parseHtml, textOf } from '../normalize/html.js';
import { ParseError } from '../shared/errors.js';

export interface TwitterRaw {
  html: string;
}

/**
 * Quality bucket for a download anchor's label, or null for anchors we skip.
 */
export function classifyTwitterLink(label: string): 'HD' | 'medium' | 'low' | null {
  if (label.includes('HD')) return 'HD';
  if (label.includes('640x360')) return 'medium';
  if (label.includes('480x270')) return 'low';
  return null;
}

export const twitterStrategy: ProviderStrategy<TwitterRaw> = {
  id: 'twitter',

  async bootstrap(spec, http, signal) {
    const page = await fetchLandingPage(http, spec, signal);
    return { cookies: page.cookies };
  },

  async orchestrate(ctx) {
    const base = providerHost(ctx.spec, 'base');
    const { response } = await sendWithSessionRetry(ctx, (session) =>
      ctx.http.send(
        {
          url: base,
          method: 'POST',
          headers: sessionHeaders(ctx.spec, session),
          form: { id: ctx.source.url, 'hx-target': 'target', 'hx-current-url': base },
        },
        ctx.signal,
      ),
    );
    return { html: response.body };
  },

  normalize(raw, source) {
    const cdn = providerHost(source.spec, 'cdn');
    const document = parseHtml(raw.html);

    // Later anchors of the same quality replace earlier ones but keep their slot.
    const byQuality = new Map<string, { href: string; label: string }>();
    for (const anchor of document.querySelectorAll('a[href]')) {
      const href = absoluteUrl(anchor.getAttribute('href'), cdn);
      if (!href || !href.startsWith(cdn)) continue;
      const label = textOf(anchor) ?? '';
      const quality = classifyTwitterLink(label);
      if (quality) byQuality.set(quality, { href, label });
    }

    if (byQuality.size === 0) {
      throw new ParseError('No video links found');
    }

    const formats: FormatVariant[] = [];
    for (const [quality, link] of byQuality) {
      formats.push(
        makeFormat({
          quality,
          container: 'mp4',
          downloadUrl: link.href,
          hasVideo: true,
          hasAudio: true,
          qualityLabel: link.label,
        }),
      );
    }

    return { title: null, author: null, thumbnail: null, durationSeconds: null, formats };
  },
};
