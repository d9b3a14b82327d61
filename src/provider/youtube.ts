import { z } from 'zod';
import type { ProviderStrategy, ResolutionContext } from './adapter.js';
import { providerHost, providerOption } from './schema.js';
import { parseJsonBody } from '../http/client.js';
import { fetchLandingPage } from '../session/landing.js';
import { extractConfigBlob } from '../signature/cipher.js';
import { followConvertRedirects, pollUntilComplete } from '../engine/convertJob.js';
import { makeFormat } from '../normalize/result.js';
import { absoluteUrl } from '../normalize/html.js';
import { ConversionError, InputError, ParseError, UpstreamUnavailableError } from '../shared/errors.js';
import { toBase64 } from '../shared/utils.js';

const VIDEO_ID_PATTERNS = [
  /youtu\.be\/([A-Za-z0-9_-]{11})/,
  /youtube\.com\/shorts\/([A-Za-z0-9_-]{11})/,
  /[?&]v=([A-Za-z0-9_-]{11})/,
];

// Upstream sends numeric fields as numbers or numeric strings.
const NumberLike = z
  .union([z.number(), z.string().regex(/^-?\d+$/).transform(Number)])
  .optional()
  .transform((value) => value ?? 0);

const InitSchema = z.object({
  error: NumberLike,
  convertURL: z.string().optional(),
});

const ConvertSchema = z.object({
  error: NumberLike,
  redirect: NumberLike,
  redirectURL: z.string().optional(),
  downloadURL: z.string().optional(),
  progressURL: z.string().optional(),
  title: z.string().optional(),
});

const ProgressSchema = z.object({
  error: NumberLike,
  progress: NumberLike,
  title: z.string().optional(),
});

type ConvertPayload = z.infer<typeof ConvertSchema>;
type ProgressPayload = z.infer<typeof ProgressSchema>;

/** progress >= 3 means the file is ready. */
const PROGRESS_DONE = 3;

/** A parsed payload and the URL that answered with it. */
interface Fetched<T> {
  payload: T;
  url: string;
}

export interface YoutubeRaw {
  videoId: string;
  format: string;
  downloadUrl: string;
  title: string | null;
}

export function extractVideoId(url: string): string | null {
  for (const pattern of VIDEO_ID_PATTERNS) {
    const match = pattern.exec(url);
    if (match?.[1]) return match[1];
  }
  return null;
}

function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, what: string): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ParseError(`Unexpected ${what} response shape`, {
      errors: result.error.flatten().fieldErrors,
    });
  }
  return result.data;
}

async function getJson<T>(
  ctx: ResolutionContext,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  url: string,
  query: Record<string, string>,
  what: string,
): Promise<Fetched<T>> {
  const response = await ctx.http.sendOk(
    { url, query, headers: { ...ctx.spec.headers } },
    ctx.signal,
  );
  return {
    payload: parsePayload(schema, parseJsonBody(response, `${what} response`), what),
    url: response.url,
  };
}

/**
 * URLs in upstream payloads may be escaped or relative to the response that
 * carried them.
 */
export function upstreamUrl(href: string, base: string, what: string): string {
  const url = absoluteUrl(href.replace(/\\/g, ''), base);
  if (!url) {
    throw new ParseError(`Invalid ${what} URL from upstream`, { href });
  }
  return url;
}

export const youtubeStrategy: ProviderStrategy<YoutubeRaw> = {
  id: 'youtube',

  async bootstrap(spec, http, signal) {
    const page = await fetchLandingPage(http, spec, signal);
    const blob = extractConfigBlob(page.html);
    if (!blob) {
      throw new UpstreamUnavailableError('Cipher config not found on landing page', {
        provider: spec.id,
      });
    }
    return { cookies: page.cookies, configBlob: blob };
  },

  async orchestrate(ctx) {
    const videoId = extractVideoId(ctx.source.url);
    if (!videoId) {
      throw new InputError('No YouTube video id in URL', { url: ctx.source.url });
    }
    const watchUrl = `https://www.youtube.com/watch?v=${videoId}`;
    const format = providerOption(ctx.spec, 'format', 'mp3');
    const api = providerHost(ctx.spec, 'api').replace(/\/+$/, '');

    const { key } = await ctx.acquireSignedSession();
    const k = toBase64(key);

    ctx.state.advance('initiated');
    const initStep = await getJson(ctx, InitSchema, `${api}/api/v1/init`, { k, _: String(Date.now()) }, 'init');
    const init = initStep.payload;
    if (init.error > 0) {
      throw new ConversionError(`Upstream init failed with error code ${init.error}`);
    }
    if (!init.convertURL) {
      throw new ParseError('Init response carries no convert URL');
    }

    ctx.state.advance('converting');
    const convertStep = await followConvertRedirects<Fetched<ConvertPayload>>(
      upstreamUrl(init.convertURL, initStep.url, 'convert'),
      (url) => getJson(ctx, ConvertSchema, url, { v: watchUrl, f: format, _: String(Date.now()), k }, 'convert'),
      (step) =>
        step.payload.redirect === 1 && step.payload.redirectURL
          ? upstreamUrl(step.payload.redirectURL, step.url, 'redirect')
          : null,
      ctx.settings.maxRedirectHops,
    );
    const converted = convertStep.payload;
    if (converted.error > 0) {
      throw new ConversionError(`Upstream conversion failed with error code ${converted.error}`);
    }
    if (!converted.downloadURL) {
      throw new ParseError('Convert response carries no download URL');
    }

    const downloadUrl = upstreamUrl(converted.downloadURL, convertStep.url, 'download');

    let title = converted.title ?? null;
    if (converted.progressURL) {
      const progress = await pollUntilComplete<ProgressPayload>({
        progressUrl: upstreamUrl(converted.progressURL, convertStep.url, 'progress'),
        maxAttempts: ctx.settings.pollMaxAttempts,
        intervalMs: ctx.settings.pollIntervalMs,
        signal: ctx.signal,
        log: ctx.log,
        check: async (poll) => {
          const { payload } = await getJson(
            ctx,
            ProgressSchema,
            poll.progressUrl,
            { _: String(Date.now()), k },
            'progress',
          );
          if (payload.error > 0) {
            throw new ConversionError(`Upstream conversion failed with error code ${payload.error}`, {
              attempt: poll.attempt,
            });
          }
          return payload;
        },
        isComplete: (payload) => payload.progress >= PROGRESS_DONE,
      });
      title = progress.title ?? title;
    }

    return { videoId, format, downloadUrl, title };
  },

  normalize(raw) {
    const hasVideo = raw.format === 'mp4';
    return {
      title: raw.title,
      author: null,
      thumbnail: null,
      durationSeconds: null,
      formats: [
        makeFormat({
          quality: raw.format,
          container: raw.format,
          downloadUrl: raw.downloadUrl,
          hasVideo,
          hasAudio: true,
        }),
      ],
    };
  },
};
