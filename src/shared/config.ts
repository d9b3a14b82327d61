import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getResolverDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().int().positive().default(8000),
      host: z.string().default('127.0.0.1'),
      api_key: z.string().default(''),
    })
    .default({}),

  http: z
    .object({
      timeout_ms: z.number().int().positive().default(10000),
      retries: z.number().int().min(0).default(2),
      retry_delay_ms: z.number().int().min(0).default(1000),
    })
    .default({}),

  session: z
    .object({
      ttl_ms: z.number().int().positive().default(600000),
    })
    .default({}),

  poll: z
    .object({
      interval_ms: z.number().int().min(0).default(3000),
      max_attempts: z.number().int().positive().default(10),
    })
    .default({}),

  redirect: z
    .object({
      max_hops: z.number().int().min(0).default(5),
    })
    .default({}),

  // Empty means the provider files bundled with the package.
  providers_dir: z.string().default(''),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('media-resolver', {
    searchPlaces: [
      'media-resolver.config.yaml',
      'media-resolver.config.yml',
      '.media-resolverrc.yaml',
      '.media-resolverrc.yml',
    ],
  });

  const envConfigPath = process.env['MEDIA_RESOLVER_CONFIG'];
  const defaultConfigPath = path.join(getResolverDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    if (isRecord(result?.config)) rawConfig = result.config;
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    if (isRecord(result?.config)) rawConfig = result.config;
  } else {
    logger.debug('No config file found, using defaults');
  }

  applyEnvOverrides(rawConfig, process.env);

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

/**
 * Overlay server settings from the environment onto a raw config object.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): void {
  const envApiKey = env['MEDIA_RESOLVER_API_KEY'];
  const envPort = env['PORT'];
  if (!envApiKey && !envPort) return;

  const existing = rawConfig['server'];
  const server: Record<string, unknown> = isRecord(existing) ? { ...existing } : {};
  if (envApiKey) server['api_key'] = envApiKey;
  if (envPort) {
    const port = Number(envPort);
    if (!Number.isInteger(port)) {
      throw new ConfigError(`PORT is not an integer: ${envPort}`);
    }
    server['port'] = port;
  }
  rawConfig['server'] = server;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
