import type { ProviderStrategy, ResolutionContext } from './adapter.js';
import { providerHost, providerOption } from './schema.js';
import { fetchLandingPage, sessionHeaders } from '../session/landing.js';
import type { SessionContext } from '../session/sessionManager.js';
import { sendWithSessionRetry } from '../engine/scrape.js';
import { parseJsonBody } from '../http/client.js';
import { makeFormat, type FormatVariant } from '../normalize/result.js';
import {
  absoluteUrl,
  asSize,
  asText,
  attrOf,
  isRecord,
  parseDuration,
  parseHtml,
  parseJsonOrNull,
} from '../normalize/html.js';
import { ParseError, UpstreamUnavailableError } from '../shared/errors.js';
import { toBase64 } from '../shared/utils.js';

const API_PATH = '/wp-json/mx-downloader/video-data/';
const DOWNLOAD_PATH = '/wp-content/plugins/aio-video-downloader/download.php';
const SCRIPT_TOKEN = /token["\s:]+(["'])([^"']+)\1/;

export interface DouyinRaw {
  info: Record<string, unknown> & { medias: unknown[] };
  /** Real download URL per entry of `info.medias`, null when unresolved. */
  realUrls: Array<string | null>;
}

/**
 * Request hash the helper expects alongside the URL.
 */
export function calculateHash(url: string, salt = 'aio-dl'): string {
  return `${toBase64(url)}${url.length + 1000}${toBase64(salt)}`;
}

export function findPageToken(html: string): string | null {
  const document = parseHtml(html);
  const input = attrOf(document.querySelector('input#token'), 'value');
  if (input) return input;

  for (const script of document.querySelectorAll('script')) {
    const text = script.textContent ?? '';
    if (!text.includes('token')) continue;
    const match = SCRIPT_TOKEN.exec(text);
    if (match?.[2]) return match[2];
  }
  return null;
}

async function resolveMediaUrl(
  ctx: ResolutionContext,
  session: SessionContext,
  index: number,
  signal: AbortSignal,
): Promise<string | null> {
  const base = providerHost(ctx.spec, 'base');
  const endpoint = new URL(DOWNLOAD_PATH, base).toString();
  const response = await ctx.http.send(
    {
      url: endpoint,
      query: { source: 'douyin', media: toBase64(String(index)), bandwidth_saving: '1' },
      headers: sessionHeaders(ctx.spec, session),
      redirect: 'manual',
    },
    signal,
  );

  // The helper answers with either a JSON body or a redirect.
  const body = parseJsonOrNull(response.body);
  if (isRecord(body) && typeof body['url'] === 'string') {
    return absoluteUrl(body['url'], base);
  }

  const location = response.headers.get('location');
  if (location) return absoluteUrl(location, base);
  return response.ok && !response.url.startsWith(endpoint) ? response.url : null;
}

export const douyinStrategy: ProviderStrategy<DouyinRaw> = {
  id: 'douyin',

  async bootstrap(spec, http, signal) {
    const page = await fetchLandingPage(http, spec, signal);
    const token = findPageToken(page.html);
    if (!token) {
      throw new UpstreamUnavailableError('Token not found on landing page', { provider: spec.id });
    }
    return { cookies: page.cookies, tokens: { token } };
  },

  async orchestrate(ctx) {
    const url = ctx.source.url;
    const salt = providerOption(ctx.spec, 'hash_salt', 'aio-dl');
    const endpoint = new URL(API_PATH, providerHost(ctx.spec, 'base')).toString();

    const { response, session } = await sendWithSessionRetry(ctx, (current) =>
      ctx.http.send(
        {
          url: endpoint,
          method: 'POST',
          headers: sessionHeaders(ctx.spec, current),
          form: { url, token: current.tokens['token'] ?? '', hash: calculateHash(url, salt) },
        },
        ctx.signal,
      ),
    );

    const info = parseJsonBody(response, 'Video data response');
    if (!isRecord(info) || !Array.isArray(info['medias'])) {
      throw new ParseError('No media found in response');
    }
    const medias: unknown[] = info['medias'];

    ctx.state.advance('converting');
    // One failed lookup cancels the rest.
    const lookups = new AbortController();
    const signal = AbortSignal.any([ctx.signal, lookups.signal]);
    try {
      const realUrls = await Promise.all(
        medias.map((media, index) =>
          isRecord(media) && media['url'] ? resolveMediaUrl(ctx, session, index, signal) : Promise.resolve(null),
        ),
      );
      return { info: { ...info, medias }, realUrls };
    } catch (err) {
      lookups.abort();
      throw err;
    }
  },

  normalize(raw) {
    const formats: FormatVariant[] = [];
    raw.info.medias.forEach((media, index) => {
      const realUrl = raw.realUrls[index];
      if (!isRecord(media) || !realUrl) return;
      const label = asText(media['quality']) ?? '';
      const container = asText(media['extension']) ?? 'mp4';
      formats.push(
        makeFormat({
          quality: label || container,
          container,
          sizeBytes: asSize(media['size']),
          downloadUrl: realUrl,
          hasVideo: media['videoAvailable'] === true,
          hasAudio: media['audioAvailable'] === true,
          qualityLabel: label,
        }),
      );
    });

    return {
      title: asText(raw.info['title']),
      author: asText(raw.info['author']),
      thumbnail: asText(raw.info['thumbnail']),
      durationSeconds: parseDuration(raw.info['duration']),
      formats,
    };
  },
};
