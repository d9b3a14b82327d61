import { ParseError, type ResolverError } from '../shared/errors.js';

export interface FormatVariant {
  quality: string;
  container: string;
  sizeBytes: number | null;
  /** Always absolute. */
  downloadUrl: string;
  hasVideo: boolean;
  hasAudio: boolean;
  note: string;
}

export interface MediaData {
  url: string;
  title: string | null;
  author: string | null;
  thumbnail: string | null;
  durationSeconds: number | null;
  formats: FormatVariant[];
  /** quality -> downloadUrl, in `formats` order. */
  videos: Record<string, string>;
  lyrics?: string[];
}

/** What a provider's normalizer produces; the resolver fills in the rest. */
export type MediaDraft = Omit<MediaData, 'url' | 'videos'>;

export type MediaResult =
  | { status: 'success'; message: string; data: MediaData }
  | { status: 'error'; message: string; code: string; data: null };

const BEST_QUALITY_MARKER = '⭐';

/**
 * Capability labels in fixed order, then "Best Quality" when the upstream
 * label carries the star marker.
 */
export function buildFormatNote(hasVideo: boolean, hasAudio: boolean, qualityLabel = ''): string {
  const notes: string[] = [];
  if (hasVideo) notes.push('Video');
  if (hasAudio) notes.push('Audio');
  if (qualityLabel.includes(BEST_QUALITY_MARKER)) notes.push('Best Quality');
  return notes.join(' + ');
}

export interface FormatInput {
  quality: string;
  container: string;
  sizeBytes?: number | null;
  downloadUrl: string;
  hasVideo: boolean;
  hasAudio: boolean;
  /** Raw upstream label used for the note; defaults to `quality`. */
  qualityLabel?: string;
}

export function makeFormat(input: FormatInput): FormatVariant {
  let parsed: URL;
  try {
    parsed = new URL(input.downloadUrl);
  } catch {
    throw new ParseError(`Download URL is not absolute: ${input.downloadUrl}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ParseError(`Download URL has unsupported scheme: ${parsed.protocol}`);
  }

  return {
    quality: input.quality,
    container: input.container,
    sizeBytes: input.sizeBytes ?? null,
    downloadUrl: input.downloadUrl,
    hasVideo: input.hasVideo,
    hasAudio: input.hasAudio,
    note: buildFormatNote(input.hasVideo, input.hasAudio, input.qualityLabel ?? input.quality),
  };
}

export function qualityMap(formats: readonly FormatVariant[]): Record<string, string> {
  const videos: Record<string, string> = {};
  for (const format of formats) {
    if (!(format.quality in videos)) videos[format.quality] = format.downloadUrl;
  }
  return videos;
}

export function toMediaResult(draft: MediaDraft, sourceUrl: string): MediaResult {
  if (draft.formats.length === 0) {
    throw new ParseError('No downloadable formats in upstream response');
  }
  return {
    status: 'success',
    message: 'Media resolved successfully',
    data: {
      url: sourceUrl,
      title: draft.title,
      author: draft.author,
      thumbnail: draft.thumbnail,
      durationSeconds: draft.durationSeconds,
      formats: draft.formats,
      videos: qualityMap(draft.formats),
      ...(draft.lyrics ? { lyrics: draft.lyrics } : {}),
    },
  };
}

export function errorResult(err: ResolverError): MediaResult {
  return { status: 'error', message: err.message, code: err.code, data: null };
}
