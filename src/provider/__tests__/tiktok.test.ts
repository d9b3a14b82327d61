import { describe, it, expect } from 'vitest';
import {
  classifyTiktokLink,
  extractTiktokVideoId,
  findFormTokens,
  isShortLink,
  tiktokStrategy,
} from '../tiktok.js';
import { bundledSpec } from '../../__tests__/helpers.js';

const source = { url: 'https://www.tiktok.com/@someone/video/7300000000000000001', spec: bundledSpec('tiktok') };

describe('extractTiktokVideoId', () => {
  it('reads ids from the usual URL shapes', () => {
    expect(extractTiktokVideoId('https://www.tiktok.com/@a/video/7300000000000000001')).toBe('7300000000000000001');
    expect(extractTiktokVideoId('https://www.iesdouyin.com/share?item_ids=42')).toBe('42');
    expect(extractTiktokVideoId('https://m.douyin.com/share/730000000000000')).toBe('730000000000000');
    expect(extractTiktokVideoId('https://www.tiktok.com/@a')).toBeNull();
  });
});

describe('isShortLink', () => {
  it('recognizes share shorteners', () => {
    expect(isShortLink('https://vm.tiktok.com/ZM123/')).toBe(true);
    expect(isShortLink('https://www.tiktok.com/@a/video/1')).toBe(false);
  });
});

describe('classifyTiktokLink', () => {
  it('checks the most specific label first', () => {
    expect(classifyTiktokLink('Download without watermark (HD)')).toBe('no_watermark_hd');
    expect(classifyTiktokLink('Download without watermark')).toBe('no_watermark');
    expect(classifyTiktokLink('Download watermark')).toBe('watermark');
    expect(classifyTiktokLink('Download MP3')).toBe('audio');
    expect(classifyTiktokLink('Back')).toBeNull();
  });
});

describe('findFormTokens', () => {
  it('collects the prefix and inline config', () => {
    const page = `
      <input name="prefix" value="pre-1">
      <script>function getNewUrl() {} var config = {"hash": "h-1", "ts": 99};</script>`;
    expect(findFormTokens(page)).toEqual({ prefix: 'pre-1', hash: 'h-1', ts: '99' });
  });

  it('ignores a malformed inline config', () => {
    const page = '<input name="prefix" value="pre-1"><script>getNewUrl(); config = {broken}</script>';
    expect(findFormTokens(page)).toEqual({ prefix: 'pre-1' });
  });

  it('returns null without a prefix', () => {
    expect(findFormTokens('<input name="other" value="x">')).toBeNull();
  });
});

describe('tiktokStrategy.normalize', () => {
  it('orders links by kind and keeps only download-host URLs', () => {
    const html = `
      <h2 id="tk-search-h2"> A short clip </h2>
      <img src="https://img.test/cover.webp">
      <div class="tk-down-link"><a href="https://dl.tiktokio.com/download/mp3">Download MP3</a></div>
      <div class="tk-down-link"><a href="https://dl.tiktokio.com/download/wm">Download watermark</a></div>
      <div class="tk-down-link"><a href="https://dl.tiktokio.com/download/hd">Download without watermark (HD)</a></div>
      <div class="tk-down-link"><a href="https://elsewhere.test/x">Download without watermark</a></div>`;

    const draft = tiktokStrategy.normalize({ html }, source);
    expect(draft.title).toBe('A short clip');
    expect(draft.thumbnail).toBe('https://img.test/cover.webp');
    expect(draft.formats.map((f) => [f.quality, f.container, f.note])).toEqual([
      ['no_watermark_hd', 'mp4', 'Video + Audio'],
      ['watermark', 'mp4', 'Video + Audio'],
      ['audio', 'mp3', 'Audio'],
    ]);
  });

  it('fails without download links', () => {
    expect(() => tiktokStrategy.normalize({ html: '<p>Video not found</p>' }, source)).toThrow(
      'No download links found',
    );
  });
});
