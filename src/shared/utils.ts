import { createHash } from 'node:crypto';
import { fileURLToPath } from 'node:url';
import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';
import { customAlphabet, nanoid } from 'nanoid';

const LETTERS = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';
const randomLetters = customAlphabet(LETTERS);

export function generateId(size = 21): string {
  return nanoid(size);
}

export function randomLetterString(size: number): string {
  return randomLetters(size);
}

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

export function md5(input: string): string {
  return createHash('md5').update(input, 'utf8').digest('hex');
}

export function toBase64(input: string): string {
  return Buffer.from(input, 'utf8').toString('base64');
}

export function fromBase64(input: string): string {
  return Buffer.from(input, 'base64').toString('utf8');
}

/**
 * Resolve after `ms`, or reject with the signal's reason once it aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    function onAbort(): void {
      clearTimeout(timer);
      reject(signal?.reason);
    }
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function getPackageRoot(): string {
  // Walk up from the current file to the directory holding package.json.
  // Works for both tsx/vitest (src/shared/utils.ts) and the build (dist/shared/utils.js).
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
}

export function getResolverDir(): string {
  return resolvePath('~/.media-resolver');
}
