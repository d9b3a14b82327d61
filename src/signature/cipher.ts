import { z } from 'zod';
import { SignatureDerivationError } from '../shared/errors.js';
import { fromBase64 } from '../shared/utils.js';

export type SigningKey = string;

export type CaseTransform = 'none' | 'lower' | 'upper';

/**
 * Decoded cipher configuration published by the helper site.
 */
export interface CipherConfig {
  /** Separator-delimited integers, each an index into the alphabet. */
  encodedSequence: string;
  alphabet: string;
  identifier: string;
  caseTransform: CaseTransform;
  /** 0 keeps the whole key. */
  truncateLength: number;
  offset: number;
  reverseAlphabet: boolean;
  separator: string;
  prefix: string;
}

const BLOB_MARKER = /<script>eval\(atob\('([^']*)'\)\);<\/script>/;

const ParamSchema = z.union([z.number(), z.string()]);

const RawCipherSchema = z.object({
  '0': z.string().min(1),
  '1': z.string().min(1),
  '2': z.string().min(1),
  f: z.array(ParamSchema).min(6),
});

/**
 * Find the base64 payload of the self-evaluating snippet in a landing page.
 */
export function extractConfigBlob(html: string): string | null {
  const match = BLOB_MARKER.exec(html);
  return match?.[1] ? match[1] : null;
}

function toInteger(value: string | number, name: string): number {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) return Number.parseInt(value, 10);
  throw new SignatureDerivationError(`Cipher parameter ${name} is not an integer`, {
    value: String(value),
  });
}

function toCaseTransform(mode: number): CaseTransform {
  if (mode === 1) return 'lower';
  if (mode === 2) return 'upper';
  return 'none';
}

/**
 * Decode a config blob and validate its shape. Never returns a partially
 * matched configuration.
 */
export function parseCipherConfig(blob: string): CipherConfig {
  const decoded = fromBase64(blob);
  const start = decoded.indexOf('{');
  const end = decoded.lastIndexOf('}');
  if (start < 0 || end <= start) {
    throw new SignatureDerivationError('Cipher config object not found in decoded blob');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(decoded.slice(start, end + 1).replace(/'/g, '"'));
  } catch (err) {
    throw new SignatureDerivationError('Cipher config is not parseable', {
      error: err instanceof Error ? err.message : String(err),
    });
  }

  const result = RawCipherSchema.safeParse(raw);
  if (!result.success) {
    throw new SignatureDerivationError('Cipher config has an unexpected shape', {
      errors: result.error.flatten().fieldErrors,
    });
  }

  const { f } = result.data;
  const [caseMode, truncate, offset, reverse, separator, prefix] = f;
  if (
    caseMode === undefined ||
    truncate === undefined ||
    offset === undefined ||
    reverse === undefined ||
    separator === undefined ||
    prefix === undefined
  ) {
    throw new SignatureDerivationError('Cipher parameter list is incomplete');
  }
  if (String(separator).length === 0) {
    throw new SignatureDerivationError('Cipher separator is empty');
  }

  return {
    encodedSequence: fromBase64(result.data['0']),
    alphabet: result.data['1'],
    identifier: result.data['2'],
    caseTransform: toCaseTransform(toInteger(caseMode, 'case')),
    truncateLength: Math.max(0, toInteger(truncate, 'truncate')),
    offset: toInteger(offset, 'offset'),
    reverseAlphabet: toInteger(reverse, 'reverse') > 0,
    separator: String(separator),
    prefix: String(prefix),
  };
}

/**
 * Compute the signing token from a validated configuration.
 */
export function computeSigningToken(config: CipherConfig): SigningKey {
  const alphabet = config.reverseAlphabet
    ? [...config.alphabet].reverse().join('')
    : config.alphabet;

  let key = '';
  for (const part of config.encodedSequence.split(config.separator)) {
    if (!/^\s*-?\d+\s*$/.test(part)) continue;
    const index = Number.parseInt(part, 10) - config.offset;
    if (index >= 0 && index < alphabet.length) {
      key += alphabet.charAt(index);
    }
  }

  if (config.caseTransform === 'lower') key = key.toLowerCase();
  else if (config.caseTransform === 'upper') key = key.toUpperCase();

  if (config.truncateLength > 0) key = key.slice(0, config.truncateLength);

  return `${config.identifier}-${config.prefix}${key}`;
}

export function deriveSigningToken(configBlob: string): SigningKey {
  return computeSigningToken(parseCipherConfig(configBlob));
}
