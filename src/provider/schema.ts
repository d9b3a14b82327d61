import { z } from 'zod';
import { ConfigError } from '../shared/errors.js';

export const PROTOCOL_SHAPES = ['direct', 'convert', 'scrape'] as const;

export type ProtocolShape = (typeof PROTOCOL_SHAPES)[number];

export const ProviderFileSchema = z.object({
  id: z.string().regex(/^[a-z0-9_]+$/),
  name: z.string().min(1),
  protocol: z.enum(PROTOCOL_SHAPES),
  // Lower runs first when detecting a provider from arbitrary text.
  priority: z.number().int().default(100),
  hosts: z
    .record(z.string().url())
    .refine((hosts) => 'base' in hosts, { message: 'hosts.base is required' }),
  headers: z.record(z.string()).default({}),
  url: z.object({
    patterns: z.array(z.string().min(1)).min(1),
    keep_query: z.boolean().default(false),
    keep_fragment: z.boolean().default(false),
  }),
  options: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
});

export type ProviderFile = z.infer<typeof ProviderFileSchema>;

/**
 * Static description of one upstream helper site. Built once at startup and
 * frozen; shared by every resolution.
 */
export interface ProviderSpec {
  readonly id: string;
  readonly name: string;
  readonly protocol: ProtocolShape;
  readonly priority: number;
  readonly hosts: Readonly<Record<string, string>>;
  readonly headers: Readonly<Record<string, string>>;
  readonly url: {
    readonly patterns: readonly RegExp[];
    readonly keepQuery: boolean;
    readonly keepFragment: boolean;
  };
  readonly options: Readonly<Record<string, string | number | boolean>>;
}

export function toProviderSpec(file: ProviderFile): ProviderSpec {
  const patterns = file.url.patterns.map((source) => {
    try {
      return new RegExp(source);
    } catch (err) {
      throw new ConfigError(`Invalid URL pattern for provider ${file.id}`, {
        pattern: source,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  });

  return Object.freeze({
    id: file.id,
    name: file.name,
    protocol: file.protocol,
    priority: file.priority,
    hosts: Object.freeze({ ...file.hosts }),
    headers: Object.freeze({ ...file.headers }),
    url: Object.freeze({
      patterns: Object.freeze(patterns),
      keepQuery: file.url.keep_query,
      keepFragment: file.url.keep_fragment,
    }),
    options: Object.freeze({ ...file.options }),
  });
}

export function providerHost(spec: ProviderSpec, name: string): string {
  const host = spec.hosts[name];
  if (!host) {
    throw new ConfigError(`Provider ${spec.id} does not declare host "${name}"`);
  }
  return host;
}

export function providerOption(spec: ProviderSpec, name: string, fallback: string): string {
  const value = spec.options[name];
  return value === undefined ? fallback : String(value);
}
