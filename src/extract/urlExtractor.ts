import type { ProviderSpec } from '../provider/schema.js';
import type { SourceUrl } from '../provider/adapter.js';
import { InputError } from '../shared/errors.js';

// Punctuation that share texts commonly glue onto the end of a link.
const TRAILING_PUNCTUATION = /[.,;:!?)\]}'"」】』》，。！？；：、]+$/u;

function candidateOf(match: RegExpExecArray): string {
  return (match.groups?.['url'] ?? match[0]).trim();
}

/**
 * Turn a raw match into a normalized http(s) URL, or null if it is not one.
 */
export function normalizeCandidate(candidate: string, spec: ProviderSpec): string | null {
  let text = candidate.replace(TRAILING_PUNCTUATION, '');
  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(text)) {
    text = `https://${text}`;
  }

  let url: URL;
  try {
    url = new URL(text);
  } catch {
    return null;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;

  if (!spec.url.keepQuery) url.search = '';
  if (!spec.url.keepFragment) url.hash = '';
  return url.toString();
}

/**
 * First provider URL in `text`. Providers are tried in order, each provider's
 * patterns in order; within a pattern the earliest match wins. Pure.
 */
export function extractSourceUrl(text: string, specs: readonly ProviderSpec[]): SourceUrl {
  for (const spec of specs) {
    for (const pattern of spec.url.patterns) {
      const scanner = new RegExp(pattern.source, `${pattern.flags.replace('g', '')}g`);
      for (let match = scanner.exec(text); match !== null; match = scanner.exec(text)) {
        if (match[0].length === 0) {
          scanner.lastIndex++;
          continue;
        }
        const url = normalizeCandidate(candidateOf(match), spec);
        if (url) return { url, spec };
      }
    }
  }

  const label = specs.length === 1 && specs[0] ? specs[0].name : 'supported';
  throw new InputError(`No ${label} URL found in text`, {
    providers: specs.map((s) => s.id),
  });
}
