import { describe, it, expect } from 'vitest';
import { buildFormatNote, errorResult, makeFormat, qualityMap, toMediaResult } from '../result.js';
import { ConversionError, ParseError } from '../../shared/errors.js';
import { tiktokStrategy } from '../../provider/tiktok.js';
import { bundledSpec } from '../../__tests__/helpers.js';

describe('buildFormatNote', () => {
  it('lists capabilities in fixed order', () => {
    expect(buildFormatNote(true, true)).toBe('Video + Audio');
    expect(buildFormatNote(false, true)).toBe('Audio');
    expect(buildFormatNote(true, false)).toBe('Video');
    expect(buildFormatNote(false, false)).toBe('');
  });

  it('flags starred labels as best quality', () => {
    expect(buildFormatNote(true, true, '1080p ⭐')).toBe('Video + Audio + Best Quality');
  });
});

describe('makeFormat', () => {
  it('defaults size to null and builds the note from quality', () => {
    expect(
      makeFormat({
        quality: 'HD',
        container: 'mp4',
        downloadUrl: 'https://cdn.test/v.mp4',
        hasVideo: true,
        hasAudio: true,
      }),
    ).toEqual({
      quality: 'HD',
      container: 'mp4',
      sizeBytes: null,
      downloadUrl: 'https://cdn.test/v.mp4',
      hasVideo: true,
      hasAudio: true,
      note: 'Video + Audio',
    });
  });

  it('rejects relative and non-http URLs', () => {
    const base = { quality: 'a', container: 'mp3', hasVideo: false, hasAudio: true };
    expect(() => makeFormat({ ...base, downloadUrl: '/dl/1' })).toThrow(ParseError);
    expect(() => makeFormat({ ...base, downloadUrl: 'javascript:void(0)' })).toThrow(
      'Download URL has unsupported scheme: javascript:',
    );
  });
});

describe('qualityMap', () => {
  it('keeps the first URL per quality', () => {
    const formats = [
      makeFormat({ quality: 'HD', container: 'mp4', downloadUrl: 'https://a.test/1', hasVideo: true, hasAudio: true }),
      makeFormat({ quality: 'HD', container: 'mp4', downloadUrl: 'https://a.test/2', hasVideo: true, hasAudio: true }),
      makeFormat({ quality: 'low', container: 'mp4', downloadUrl: 'https://a.test/3', hasVideo: true, hasAudio: true }),
    ];
    expect(qualityMap(formats)).toEqual({ HD: 'https://a.test/1', low: 'https://a.test/3' });
  });
});

describe('toMediaResult', () => {
  const draft = {
    title: 'Clip',
    author: null,
    thumbnail: null,
    durationSeconds: 12,
    formats: [
      makeFormat({ quality: 'mp3', container: 'mp3', downloadUrl: 'https://a.test/s.mp3', hasVideo: false, hasAudio: true }),
    ],
  };

  it('wraps a draft in a success envelope', () => {
    const result = toMediaResult(draft, 'https://source.test/1');
    expect(result.status).toBe('success');
    expect(result.message).toBe('Media resolved successfully');
    expect(result.data?.url).toBe('https://source.test/1');
    expect(result.data?.videos).toEqual({ mp3: 'https://a.test/s.mp3' });
    expect(result.data).not.toHaveProperty('lyrics');
  });

  it('carries lyrics when present', () => {
    const result = toMediaResult({ ...draft, lyrics: ['la la'] }, 'https://source.test/1');
    expect(result.data?.lyrics).toEqual(['la la']);
  });

  it('refuses an empty format list', () => {
    expect(() => toMediaResult({ ...draft, formats: [] }, 'https://source.test/1')).toThrow(
      'No downloadable formats in upstream response',
    );
  });
});

describe('normalizing a canned payload', () => {
  it('gives equal results with the same format order each time', () => {
    const source = { url: 'https://www.tiktok.com/@a/video/7300000000000000001', spec: bundledSpec('tiktok') };
    const page = `
      <div class="tk-down-link"><a href="https://dl.tiktokio.com/download/mp3">Download MP3</a></div>
      <div class="tk-down-link"><a href="https://dl.tiktokio.com/download/sd">Download without watermark</a></div>`;

    const first = toMediaResult(tiktokStrategy.normalize({ html: page }, source), source.url);
    const second = toMediaResult(tiktokStrategy.normalize({ html: page }, source), source.url);

    expect(second).toEqual(first);
    expect(second.data?.formats.map((f) => f.quality)).toEqual(['no_watermark', 'audio']);
  });
});

describe('errorResult', () => {
  it('exposes the error code and message', () => {
    expect(errorResult(new ConversionError('Upstream init failed with error code 1'))).toEqual({
      status: 'error',
      message: 'Upstream init failed with error code 1',
      code: 'CONVERSION_ERROR',
      data: null,
    });
  });
});
