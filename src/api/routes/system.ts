import { Hono } from 'hono';
import type { AppContext } from '../server.js';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health — basic health check
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      version: '0.1.0',
      uptime: process.uptime(),
    });
  });

  // GET /api/providers — configured providers in detection order
  app.get('/providers', (c) => {
    const providers = ctx.resolver.providers().map((spec) => ({
      id: spec.id,
      name: spec.name,
      protocol: spec.protocol,
      priority: spec.priority,
      patterns: spec.url.patterns.map((pattern) => pattern.source),
      session: ctx.resolver.sessions.peek(spec.id) !== undefined,
    }));
    return c.json(providers);
  });

  return app;
}
