import type { ProviderStrategy, ResolutionContext } from './adapter.js';
import { providerHost } from './schema.js';
import { fetchLandingPage, sessionHeaders } from '../session/landing.js';
import { sendWithSessionRetry } from '../engine/scrape.js';
import { makeFormat, type FormatVariant } from '../normalize/result.js';
import { attrOf, isRecord, parseHtml, parseJsonOrNull, textOf } from '../normalize/html.js';
import { InputError, ParseError, UpstreamUnavailableError } from '../shared/errors.js';
import { randomLetterString } from '../shared/utils.js';

const SHORT_LINK_HOSTS = ['v.douyin.com', 'vm.tiktok.com', 'vt.tiktok.com'];

const VIDEO_ID_PATTERNS = [/\/video\/(\d+)/, /item_ids=(\d+)/, /\/(\d{15,21})/];

const SCRIPT_CONFIG = /config\s*=\s*(\{[^}]+\})/;

export type TiktokLinkKind = 'no_watermark_hd' | 'no_watermark' | 'watermark' | 'audio';

const LINK_ORDER: readonly TiktokLinkKind[] = ['no_watermark_hd', 'no_watermark', 'watermark', 'audio'];

export interface TiktokRaw {
  html: string;
}

export function classifyTiktokLink(label: string): TiktokLinkKind | null {
  const text = label.toLowerCase();
  if (text.includes('without watermark (hd)')) return 'no_watermark_hd';
  if (text.includes('without watermark')) return 'no_watermark';
  if (text.includes('watermark')) return 'watermark';
  if (text.includes('mp3')) return 'audio';
  return null;
}

export function extractTiktokVideoId(url: string): string | null {
  for (const pattern of VIDEO_ID_PATTERNS) {
    const match = pattern.exec(url);
    if (match?.[1]) return match[1];
  }
  return null;
}

export function isShortLink(url: string): boolean {
  try {
    return SHORT_LINK_HOSTS.includes(new URL(url).hostname);
  } catch {
    return false;
  }
}

/**
 * Form fields the landing page expects back: the `prefix` input plus the
 * inline script config when present.
 */
export function findFormTokens(html: string): Record<string, string> | null {
  const document = parseHtml(html);
  const prefix = attrOf(document.querySelector('input[name="prefix"]'), 'value');
  if (!prefix) return null;

  const tokens: Record<string, string> = { prefix };
  for (const script of document.querySelectorAll('script')) {
    const text = script.textContent ?? '';
    if (!text.includes('getNewUrl')) continue;
    const match = SCRIPT_CONFIG.exec(text);
    if (!match?.[1]) continue;
    // Optional; a malformed config is ignored.
    const config = parseJsonOrNull(match[1]);
    if (isRecord(config)) {
      for (const [name, value] of Object.entries(config)) {
        if (typeof value === 'string' || typeof value === 'number') tokens[name] = String(value);
      }
    }
  }
  return tokens;
}

async function expandShortLink(ctx: ResolutionContext, url: string): Promise<string> {
  try {
    const response = await ctx.http.send({ url, headers: { ...ctx.spec.headers } }, ctx.signal);
    if (response.ok) return response.url;
    ctx.log.debug({ url, status: response.status }, 'Short link did not expand');
    return url;
  } catch (err) {
    if (ctx.signal.aborted) throw err;
    ctx.log.debug({ url, error: err instanceof Error ? err.message : String(err) }, 'Short link expansion failed');
    return url;
  }
}

export const tiktokStrategy: ProviderStrategy<TiktokRaw> = {
  id: 'tiktok',

  async bootstrap(spec, http, signal) {
    const page = await fetchLandingPage(http, spec, signal);
    const tokens = findFormTokens(page.html);
    if (!tokens) {
      throw new UpstreamUnavailableError('Prefix token not found on landing page', { provider: spec.id });
    }
    return { cookies: page.cookies, tokens };
  },

  async orchestrate(ctx) {
    let url = ctx.source.url;
    if (isShortLink(url)) {
      url = await expandShortLink(ctx, url);
    }
    const videoId = extractTiktokVideoId(url);
    if (!videoId) {
      throw new InputError('Could not extract video ID from input', { url });
    }

    const base = providerHost(ctx.spec, 'base').replace(/\/+$/, '');
    const { response } = await sendWithSessionRetry(ctx, (session) =>
      ctx.http.send(
        {
          url: `${base}/api/v1/tk-htmx`,
          method: 'POST',
          query: { t: String(Date.now()), r: randomLetterString(10) },
          headers: sessionHeaders(ctx.spec, session, {
            'X-Requested-With': 'XMLHttpRequest',
            'HX-Request': 'true',
            'HX-Current-URL': `${base}/`,
            'HX-Target': 'tiktok-parse-result',
            Origin: base,
            Referer: `${base}/`,
          }),
          form: { vid: `https://www.douyin.com/video/${videoId}`, ...session.tokens },
        },
        ctx.signal,
      ),
    );
    return { html: response.body };
  },

  normalize(raw, source) {
    const downloadHost = providerHost(source.spec, 'download');
    const document = parseHtml(raw.html);

    const links = new Map<TiktokLinkKind, string>();
    for (const anchor of document.querySelectorAll('.tk-down-link a')) {
      const href = attrOf(anchor, 'href');
      if (!href || !href.startsWith(downloadHost)) continue;
      const kind = classifyTiktokLink(textOf(anchor) ?? '');
      if (kind) links.set(kind, href);
    }

    if (links.size === 0) {
      throw new ParseError('No download links found');
    }

    const formats: FormatVariant[] = [];
    for (const kind of LINK_ORDER) {
      const href = links.get(kind);
      if (!href) continue;
      const audio = kind === 'audio';
      formats.push(
        makeFormat({
          quality: kind,
          container: audio ? 'mp3' : 'mp4',
          downloadUrl: href,
          hasVideo: !audio,
          hasAudio: true,
        }),
      );
    }

    return {
      title: textOf(document.querySelector('#tk-search-h2')),
      author: null,
      thumbnail: attrOf(document.querySelector('img[src*="webp"]'), 'src'),
      durationSeconds: null,
      formats,
    };
  },
};
