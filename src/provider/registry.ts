import type { ProviderStrategy } from './adapter.js';
import { douyinStrategy } from './douyin.js';
import { easyDownloaderStrategy } from './easydownloader.js';
import { qishuiStrategy } from './qishui.js';
import { spotifyStrategy } from './spotify.js';
import { tiktokStrategy } from './tiktok.js';
import { twitterStrategy } from './twitter.js';
import { youtubeStrategy } from './youtube.js';

const strategies: ProviderStrategy[] = [
  youtubeStrategy,
  twitterStrategy,
  qishuiStrategy,
  douyinStrategy,
  tiktokStrategy,
  spotifyStrategy,
  easyDownloaderStrategy,
];

/** Built-in strategies keyed by provider id. */
export const defaultStrategies: ReadonlyMap<string, ProviderStrategy> = new Map(
  strategies.map((strategy) => [strategy.id, strategy]),
);
