import { JSDOM } from 'jsdom';
import { ParseError } from '../shared/errors.js';

export function parseHtml(html: string, url?: string): Document {
  return new JSDOM(html, url ? { url } : {}).window.document;
}

export function textOf(element: Element | null | undefined): string | null {
  const text = element?.textContent?.replace(/\s+/g, ' ').trim();
  return text ? text : null;
}

export function attrOf(element: Element | null | undefined, name: string): string | null {
  const value = element?.getAttribute(name)?.trim();
  return value ? value : null;
}

export function absoluteUrl(href: string | null | undefined, base: string): string | null {
  if (!href) return null;
  try {
    const url = new URL(href, base);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url.toString() : null;
  } catch {
    return null;
  }
}

/**
 * Slice the outermost balanced `{...}` starting at `start`, skipping braces
 * inside string literals.
 */
export function sliceJsonObject(text: string, start: number): string | null {
  const open = text.indexOf('{', start);
  if (open < 0) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(open, i + 1);
    }
  }
  return null;
}

/**
 * JSON object embedded in a page script, located by a marker token such as
 * `window._ROUTER_DATA`.
 */
export function extractEmbeddedJson(html: string, marker: string): unknown {
  const at = html.indexOf(marker);
  if (at < 0) {
    throw new ParseError(`Marker ${marker} not found in page`);
  }
  const json = sliceJsonObject(html, at + marker.length);
  if (!json) {
    throw new ParseError(`No JSON object after ${marker}`);
  }
  try {
    return JSON.parse(json) as unknown;
  } catch (err) {
    throw new ParseError(`Embedded JSON after ${marker} is invalid`, {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

/** Parsed JSON, or null when `text` is not JSON. */
export function parseJsonOrNull(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return null;
  }
}

/**
 * Seconds from a number, a numeric string, or `mm:ss` / `hh:mm:ss`.
 */
export function parseDuration(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) return Number(trimmed);
  if (!/^\d+(:\d{1,2}){1,2}$/.test(trimmed)) return null;
  return trimmed.split(':').reduce((total, part) => total * 60 + Number(part), 0);
}

export function containerFromUrl(url: string, fallback: string): string {
  try {
    const match = /\.([a-z0-9]{2,4})$/i.exec(new URL(url).pathname);
    return match?.[1] ? match[1].toLowerCase() : fallback;
  } catch {
    return fallback;
  }
}

export function asText(value: unknown): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

export function asSize(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) && value > 0 ? value : null;
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    const size = Number(value.trim());
    return size > 0 ? size : null;
  }
  return null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
