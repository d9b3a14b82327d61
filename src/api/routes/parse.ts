import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { errorCodeToHttpStatus } from '../status.js';
import { InputError } from '../../shared/errors.js';
import { errorResult, type MediaResult } from '../../normalize/result.js';

const ParseBodySchema = z.object({
  text: z.string().min(1),
  deadline_ms: z.number().int().positive().optional(),
});

type ParseBody = z.infer<typeof ParseBodySchema>;

/**
 * Rejects requests without the configured X-API-Key. A blank key disables the check.
 */
export function apiKeyGuard(ctx: AppContext): MiddlewareHandler {
  return async (c, next) => {
    const expected = ctx.config.server.api_key;
    if (expected && c.req.header('X-API-Key') !== expected) {
      return c.json(
        { status: 'error', message: 'Invalid or missing API key', code: 'UNAUTHORIZED', data: null },
        401,
      );
    }
    await next();
  };
}

async function readBody(body: Promise<unknown>): Promise<ParseBody | InputError> {
  const parsed = ParseBodySchema.safeParse(await body.catch(() => null));
  if (!parsed.success) {
    return new InputError('Request body must be JSON with a non-empty "text" field', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

function statusOf(result: MediaResult): ContentfulStatusCode {
  return result.status === 'success' ? 200 : errorCodeToHttpStatus(result.code);
}

export function parseRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  app.use('/parse', apiKeyGuard(ctx));
  app.use('/:provider/parse', apiKeyGuard(ctx));

  // POST /api/parse — detect the provider from the text
  app.post('/parse', async (c) => {
    const body = await readBody(c.req.json<unknown>());
    if (body instanceof InputError) {
      return c.json(errorResult(body), 400);
    }
    const result = await ctx.resolver.resolveAny(body.text, { deadlineMs: body.deadline_ms });
    return c.json(result, statusOf(result));
  });

  // POST /api/:provider/parse
  app.post('/:provider/parse', async (c) => {
    const body = await readBody(c.req.json<unknown>());
    if (body instanceof InputError) {
      return c.json(errorResult(body), 400);
    }
    const result = await ctx.resolver.resolve(c.req.param('provider'), body.text, {
      deadlineMs: body.deadline_ms,
    });
    return c.json(result, statusOf(result));
  });

  return app;
}
