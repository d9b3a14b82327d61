import fs from 'node:fs';
import path from 'node:path';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { Config } from '../shared/config.js';
import { ResolverError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import { getResolverDir } from '../shared/utils.js';
import { getProviderSpecs } from '../provider/loader.js';
import { initResolver, type Resolver } from '../engine/resolver.js';
import { errorCodeToHttpStatus } from './status.js';
import { parseRoutes } from './routes/parse.js';
import { systemRoutes } from './routes/system.js';

export interface AppContext {
  config: Config;
  resolver: Resolver;
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.use('*', cors());

  app.route('/api', systemRoutes(ctx));
  app.route('/api', parseRoutes(ctx));

  app.onError((err, c) => {
    if (err instanceof ResolverError) {
      const status = errorCodeToHttpStatus(err.code);
      return c.json({ status: 'error', message: err.message, code: err.code, data: null }, status);
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ status: 'error', message: 'Internal server error', code: 'INTERNAL', data: null }, 500);
  });

  app.notFound((c) => {
    return c.json({ status: 'error', message: 'Not found', code: 'NOT_FOUND', data: null }, 404);
  });

  return app;
}

/**
 * Write ~/.media-resolver/config.yaml on first run. Idempotent.
 */
function autoInit(): void {
  const configPath = path.join(getResolverDir(), 'config.yaml');
  if (!fs.existsSync(configPath) && !process.env['MEDIA_RESOLVER_CONFIG']) {
    writeDefaultConfig(configPath);
    logger.info({ configPath }, 'First run: created default config');
  }
}

export async function startServer(opts: { port?: number } = {}): Promise<void> {
  autoInit();

  const config = await loadConfig();
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const specs = getProviderSpecs(config.providers_dir);
  const resolver = initResolver(config, specs);
  const app = createApp({ config, resolver });

  logger.info({ port, host, providers: specs.map((s) => s.id) }, 'Starting media resolver');

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ url: `http://${host}:${info.port}` }, 'Listening');
  });

  const shutdown = () => {
    logger.info('Shutting down...');
    resolver.sessions.clear();
    server.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
