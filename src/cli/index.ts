#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import { getResolverDir } from '../shared/utils.js';
import { getProviderSpecs } from '../provider/loader.js';
import { initResolver } from '../engine/resolver.js';
import { startServer } from '../api/server.js';

const program = new Command();

program
  .name('media-resolver')
  .description('Resolve shared media links into direct download URLs')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create ~/.media-resolver/config.yaml with default settings')
  .action(() => {
    const configPath = path.join(getResolverDir(), 'config.yaml');
    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config and provider files')
  .action(async () => {
    const results: string[] = [];
    try {
      const config = await loadConfig();
      results.push('Config: ok');
      try {
        const specs = getProviderSpecs(config.providers_dir);
        results.push(`Providers: ${specs.length} loaded`);
      } catch (err) {
        results.push(`Providers: error (${err instanceof Error ? err.message : String(err)})`);
      }
      results.push(config.server.api_key ? 'API key: set' : 'API key: (none)');
    } catch (err) {
      results.push(`Config: error (${err instanceof Error ? err.message : String(err)})`);
    }
    log(`✓ ${results.join(' | ')}`);
  });

// === providers ===
program
  .command('providers')
  .description('List configured providers in detection order')
  .action(async () => {
    const config = await loadConfig();
    const specs = getProviderSpecs(config.providers_dir);
    if (specs.length === 0) {
      log('No providers configured.');
      return;
    }
    for (const spec of specs) {
      log(`  ${spec.id.padEnd(16)} ${spec.protocol.padEnd(8)} ${spec.name}`);
    }
  });

// === resolve ===
program
  .command('resolve <provider> <text...>')
  .description('Resolve the first link in <text>; use "auto" to detect the provider')
  .option('-d, --deadline <ms>', 'Overall deadline in milliseconds')
  .action(async (provider: string, words: string[], opts: { deadline?: string }) => {
    const config = await loadConfig();
    const resolver = initResolver(config, getProviderSpecs(config.providers_dir));
    const text = words.join(' ');
    const deadlineMs = opts.deadline ? parseInt(opts.deadline, 10) : undefined;

    const result =
      provider === 'auto'
        ? await resolver.resolveAny(text, { deadlineMs })
        : await resolver.resolve(provider, text, { deadlineMs });

    log(JSON.stringify(result, null, 2));
    if (result.status === 'error') process.exitCode = 1;
  });

// === serve ===
program
  .command('serve')
  .description('Start the HTTP API server')
  .option('-p, --port <n>', 'Port number')
  .action(async (opts: { port?: string }) => {
    await startServer({
      port: opts.port ? parseInt(opts.port, 10) : undefined,
    });
  });

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
