import type { ProviderStrategy } from './adapter.js';
import { providerHost, providerOption } from './schema.js';
import { parseJsonBody } from '../http/client.js';
import { makeFormat, type FormatVariant } from '../normalize/result.js';
import { asSize, asText, isRecord } from '../normalize/html.js';
import { ConversionError, ParseError } from '../shared/errors.js';
import { md5, toBase64 } from '../shared/utils.js';

const AUDIO_TYPES = new Set(['mp3', 'm4a', 'aac', 'wav', 'ogg', 'opus', 'audio']);

export interface EasyDownloaderRaw {
  body: unknown;
}

/**
 * Request key: md5 of base64("<epoch ms>+<host>"), then the fixed suffix.
 */
export function generateRequestKey(url: string, nowMs: number, suffix: string): string {
  return `${md5(toBase64(`${nowMs}+${new URL(url).host}`))}${suffix}`;
}

function linkToFormat(link: Record<string, unknown>): FormatVariant | null {
  const href = asText(link['link_url']);
  if (!href) return null;

  const fileType = asText(link['file_type'])?.toLowerCase() ?? '';
  const quality = `${asText(link['file_quality']) ?? ''} ${asText(link['file_quality_units']) ?? ''}`.trim();
  const audioOnly = AUDIO_TYPES.has(fileType);
  return makeFormat({
    quality: quality || fileType || 'default',
    container: fileType || 'mp4',
    sizeBytes: asSize(link['file_size']),
    downloadUrl: href,
    hasVideo: !audioOnly,
    hasAudio: true,
  });
}

export const easyDownloaderStrategy: ProviderStrategy<EasyDownloaderRaw> = {
  id: 'easydownloader',

  async orchestrate(ctx) {
    const url = ctx.source.url;
    const base = providerHost(ctx.spec, 'base').replace(/\/+$/, '');
    const key = generateRequestKey(url, Date.now(), providerOption(ctx.spec, 'key_suffix', ''));

    ctx.state.advance('initiated');
    const response = await ctx.http.sendOk(
      {
        url: `${base}/api-extract/`,
        method: 'POST',
        headers: { ...ctx.spec.headers },
        json: { video_url: url, pagination: false, key },
      },
      ctx.signal,
    );

    const body = parseJsonBody(response, 'Extract response');
    if (isRecord(body) && body['err'] === 1) {
      throw new ConversionError(asText(body['msg']) ?? 'Unknown error');
    }
    return { body };
  },

  normalize(raw) {
    const body = raw.body;
    const finalUrls = isRecord(body) && body['err'] === 0 ? body['final_urls'] : undefined;
    if (!Array.isArray(finalUrls)) {
      throw new ParseError('Unknown response format');
    }
    const videos: unknown[] = finalUrls;

    const formats: FormatVariant[] = [];
    for (const video of videos) {
      const links: unknown = isRecord(video) ? video['links'] : undefined;
      if (!Array.isArray(links)) continue;
      for (const link of links) {
        const format = isRecord(link) ? linkToFormat(link) : null;
        if (format) formats.push(format);
      }
    }

    const first = videos[0];
    return {
      title: isRecord(first) ? asText(first['title']) : null,
      author: null,
      thumbnail: isRecord(first) ? asText(first['thumb']) : null,
      durationSeconds: null,
      formats,
    };
  },
};
