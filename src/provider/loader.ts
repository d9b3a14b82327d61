import fs from 'node:fs';
import path from 'node:path';
import { parse as yamlParse } from 'yaml';
import { ProviderFileSchema, toProviderSpec, type ProviderSpec } from './schema.js';
import { getPackageRoot, resolvePath } from '../shared/utils.js';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export function parseProviderYaml(yamlContent: string): ProviderSpec {
  const raw = yamlParse(yamlContent) as unknown;
  const result = ProviderFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError('Invalid provider YAML', {
      errors: result.error.flatten().fieldErrors,
    });
  }
  return toProviderSpec(result.data);
}

export function loadProviderFile(filePath: string): ProviderSpec {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Provider file not found: ${filePath}`);
  }
  return parseProviderYaml(fs.readFileSync(filePath, 'utf-8'));
}

/**
 * Load every provider YAML in `dir`, ordered by priority then id.
 * One broken file fails the whole load.
 */
export function loadProvidersFromDir(dir: string): ProviderSpec[] {
  if (!fs.existsSync(dir)) {
    throw new ConfigError(`Providers directory not found: ${dir}`);
  }

  const files = fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.yaml') || f.endsWith('.yml'))
    .sort();

  const specs: ProviderSpec[] = [];
  const seen = new Set<string>();
  for (const file of files) {
    let spec: ProviderSpec;
    try {
      spec = loadProviderFile(path.join(dir, file));
    } catch (err) {
      if (err instanceof ConfigError) {
        throw new ConfigError(`${err.message}: ${file}`, err.details);
      }
      throw err;
    }
    if (seen.has(spec.id)) {
      throw new ConfigError(`Duplicate provider id: ${spec.id}`, { file });
    }
    seen.add(spec.id);
    specs.push(spec);
  }

  specs.sort((a, b) => a.priority - b.priority || a.id.localeCompare(b.id));
  logger.debug({ dir, count: specs.length }, 'Providers loaded');
  return specs;
}

export function defaultProvidersDir(): string {
  return path.join(getPackageRoot(), 'providers');
}

let cachedSpecs: readonly ProviderSpec[] | null = null;

export function getProviderSpecs(dir = ''): readonly ProviderSpec[] {
  if (cachedSpecs) return cachedSpecs;
  const resolved = dir ? resolvePath(dir) : defaultProvidersDir();
  cachedSpecs = Object.freeze(loadProvidersFromDir(resolved));
  return cachedSpecs;
}

export function resetProviderCache(): void {
  cachedSpecs = null;
}
