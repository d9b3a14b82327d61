import type { ProviderStrategy, ResolutionContext } from './adapter.js';
import { providerHost } from './schema.js';
import { makeFormat } from '../normalize/result.js';
import {
  absoluteUrl,
  attrOf,
  containerFromUrl,
  extractEmbeddedJson,
  isRecord,
  parseDuration,
  parseHtml,
  textOf,
} from '../normalize/html.js';
import { ParseError } from '../shared/errors.js';

const TRACK_ID = /track_id=(\d+)/;
const LYRICS_CREDIT_PREFIX = '滚动歌词&翻译贡献者';
const DURATION_STYLE = 'color:rgba(255, 255, 255, 0.5)';

export interface QishuiRaw {
  trackId: string;
  html: string;
}

function pathValue(value: unknown, path: readonly string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function audioUrlFromTrackPage(html: string): string {
  const data = extractEmbeddedJson(html, 'window._ROUTER_DATA');
  const url = pathValue(data, ['loaderData', 'track_page', 'audioWithLyricsOption', 'url']);
  if (typeof url !== 'string' || !url) {
    throw new ParseError('Audio URL not found in track page');
  }
  return url;
}

/**
 * Share links redirect to a URL carrying the track id. When they do not, the
 * share id is looked up on the track endpoint instead.
 */
async function resolveTrackId(ctx: ResolutionContext, base: string): Promise<string> {
  const share = await ctx.http.send(
    { url: ctx.source.url, headers: { ...ctx.spec.headers }, redirect: 'manual' },
    ctx.signal,
  );
  if (share.status === 301 || share.status === 302) {
    const fromLocation = TRACK_ID.exec(share.headers.get('location') ?? '');
    if (fromLocation?.[1]) return fromLocation[1];
  }

  const segments = new URL(ctx.source.url).pathname.split('/').filter(Boolean);
  const zlink = segments[segments.length - 1];
  if (zlink) {
    const lookup = await ctx.http.send(
      { url: `${base}/qishui/share/track`, query: { zlink_id: zlink }, headers: { ...ctx.spec.headers } },
      ctx.signal,
    );
    const fromLookup = TRACK_ID.exec(`${lookup.url} ${lookup.body}`);
    if (fromLookup?.[1]) return fromLookup[1];
  }

  throw new ParseError('Could not determine track id', { url: ctx.source.url });
}

export const qishuiStrategy: ProviderStrategy<QishuiRaw> = {
  id: 'qishui',

  async orchestrate(ctx) {
    const base = providerHost(ctx.spec, 'base').replace(/\/+$/, '');
    ctx.state.advance('initiated');
    const trackId = await resolveTrackId(ctx, base);

    ctx.state.advance('converting');
    const page = await ctx.http.sendOk(
      { url: `${base}/qishui/share/track`, query: { track_id: trackId }, headers: { ...ctx.spec.headers } },
      ctx.signal,
    );
    return { trackId, html: page.body };
  },

  normalize(raw, source) {
    const audioUrl = audioUrlFromTrackPage(raw.html);
    const document = parseHtml(raw.html);
    const base = providerHost(source.spec, 'base');

    const lyrics: string[] = [];
    for (const line of document.querySelectorAll('div.ssr-lyric')) {
      const text = textOf(line);
      if (text && !text.startsWith(LYRICS_CREDIT_PREFIX)) lyrics.push(text);
    }

    let durationSeconds: number | null = null;
    for (const div of document.querySelectorAll('div[style]')) {
      if (!(div.getAttribute('style') ?? '').includes(DURATION_STYLE)) continue;
      durationSeconds = parseDuration(textOf(div));
      if (durationSeconds !== null) break;
    }

    return {
      title: textOf(document.querySelector('h1.title')),
      author: textOf(document.querySelector('span.artist-name-max')),
      thumbnail: absoluteUrl(attrOf(document.querySelector('img[alt="a-image"]'), 'src'), base),
      durationSeconds,
      formats: [
        makeFormat({
          quality: 'standard',
          container: containerFromUrl(audioUrl, 'm4a'),
          downloadUrl: audioUrl,
          hasVideo: false,
          hasAudio: true,
        }),
      ],
      ...(lyrics.length > 0 ? { lyrics } : {}),
    };
  },
};
