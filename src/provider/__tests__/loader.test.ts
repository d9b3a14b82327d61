import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parseProviderYaml, loadProvidersFromDir, defaultProvidersDir } from '../loader.js';
import { providerHost, providerOption } from '../schema.js';
import { defaultStrategies } from '../registry.js';
import { ConfigError } from '../../shared/errors.js';

const sampleYaml = `
id: sample
name: "Sample Helper"
protocol: scrape
priority: 5
hosts:
  base: https://helper.test
headers:
  Accept: "*/*"
url:
  patterns:
    - 'https?://media\\.test/\\S+'
options:
  format: mp4
`;

describe('parseProviderYaml', () => {
  it('parses valid YAML into a frozen ProviderSpec', () => {
    const spec = parseProviderYaml(sampleYaml);
    expect(spec.id).toBe('sample');
    expect(spec.protocol).toBe('scrape');
    expect(spec.url.patterns[0]?.test('https://media.test/v/1')).toBe(true);
    expect(spec.url.keepQuery).toBe(false);
    expect(Object.isFrozen(spec)).toBe(true);
  });

  it('fills defaults', () => {
    const spec = parseProviderYaml(
      'id: bare\nname: Bare\nprotocol: direct\nhosts:\n  base: https://bare.test\nurl:\n  patterns: ["bare"]\n',
    );
    expect(spec.priority).toBe(100);
    expect(spec.headers).toEqual({});
    expect(spec.options).toEqual({});
  });

  it('rejects an unknown protocol', () => {
    expect(() => parseProviderYaml(sampleYaml.replace('protocol: scrape', 'protocol: magic'))).toThrow(
      ConfigError,
    );
  });

  it('rejects a missing base host', () => {
    expect(() =>
      parseProviderYaml(sampleYaml.replace('base: https://helper.test', 'cdn: https://cdn.test')),
    ).toThrow(ConfigError);
  });

  it('rejects an invalid pattern', () => {
    expect(() => parseProviderYaml(sampleYaml.replace("'https?://media\\.test/\\S+'", "'([a-'"))).toThrow(
      'Invalid URL pattern for provider sample',
    );
  });
});

describe('providerHost / providerOption', () => {
  it('reads declared hosts and options', () => {
    const spec = parseProviderYaml(sampleYaml);
    expect(providerHost(spec, 'base')).toBe('https://helper.test');
    expect(providerOption(spec, 'format', 'mp3')).toBe('mp4');
    expect(providerOption(spec, 'missing', 'fallback')).toBe('fallback');
  });

  it('throws on an undeclared host', () => {
    const spec = parseProviderYaml(sampleYaml);
    expect(() => providerHost(spec, 'cdn')).toThrow('Provider sample does not declare host "cdn"');
  });
});

describe('loadProvidersFromDir', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'providers-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('orders providers by priority then id', () => {
    fs.writeFileSync(path.join(dir, 'a.yaml'), sampleYaml.replace('id: sample', 'id: zeta'));
    fs.writeFileSync(
      path.join(dir, 'b.yaml'),
      sampleYaml.replace('id: sample', 'id: alpha').replace('priority: 5', 'priority: 1'),
    );
    fs.writeFileSync(path.join(dir, 'c.yml'), sampleYaml.replace('id: sample', 'id: beta'));
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'ignored');

    const specs = loadProvidersFromDir(dir);
    expect(specs.map((s) => s.id)).toEqual(['alpha', 'beta', 'zeta']);
  });

  it('rejects duplicate ids', () => {
    fs.writeFileSync(path.join(dir, 'a.yaml'), sampleYaml);
    fs.writeFileSync(path.join(dir, 'b.yaml'), sampleYaml);
    expect(() => loadProvidersFromDir(dir)).toThrow('Duplicate provider id: sample');
  });

  it('names the broken file', () => {
    fs.writeFileSync(path.join(dir, 'broken.yaml'), 'id: 1');
    expect(() => loadProvidersFromDir(dir)).toThrow('Invalid provider YAML: broken.yaml');
  });

  it('throws for a missing directory', () => {
    expect(() => loadProvidersFromDir(path.join(dir, 'nope'))).toThrow(ConfigError);
  });
});

describe('bundled providers', () => {
  it('load in detection order with a strategy for each', () => {
    const specs = loadProvidersFromDir(defaultProvidersDir());
    expect(specs.map((s) => s.id)).toEqual([
      'youtube',
      'twitter',
      'qishui',
      'douyin',
      'tiktok',
      'spotify',
      'easydownloader',
    ]);
    for (const spec of specs) {
      expect(defaultStrategies.has(spec.id)).toBe(true);
    }
  });
});
