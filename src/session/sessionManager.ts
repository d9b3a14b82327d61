import type { ProviderSpec } from '../provider/schema.js';
import { ResolverError, UpstreamUnavailableError } from '../shared/errors.js';
import { logger as rootLogger, type Logger } from '../shared/logger.js';

/** What a provider's bootstrap handshake yields. */
export interface SessionSeed {
  cookies?: Record<string, string>;
  tokens?: Record<string, string>;
  configBlob?: string;
}

/**
 * Ephemeral per-provider context. Never mutated: a refresh publishes a new
 * object, so readers holding the old one are unaffected.
 */
export interface SessionContext {
  readonly providerId: string;
  readonly cookies: Readonly<Record<string, string>>;
  readonly tokens: Readonly<Record<string, string>>;
  readonly configBlob: string | null;
  readonly createdAt: number;
}

export type SessionBootstrap = (signal: AbortSignal) => Promise<SessionSeed>;

/**
 * Process-wide cache of session contexts keyed by provider id.
 *
 * Created lazily on first `acquire`, refreshed when older than the TTL or
 * after `invalidate`, dropped with the process. Concurrent refreshes for the
 * same provider may race; the last one to finish wins.
 */
export class SessionManager {
  private readonly entries = new Map<string, SessionContext>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  async acquire(
    spec: ProviderSpec,
    bootstrap: SessionBootstrap,
    signal: AbortSignal,
    log: Logger = rootLogger,
  ): Promise<SessionContext> {
    const cached = this.entries.get(spec.id);
    if (cached && !this.isStale(cached)) return cached;

    let seed: SessionSeed;
    try {
      seed = await bootstrap(signal);
    } catch (err) {
      if (err instanceof ResolverError) throw err;
      throw new UpstreamUnavailableError(
        `Session bootstrap failed for ${spec.name}: ${err instanceof Error ? err.message : String(err)}`,
        { provider: spec.id },
      );
    }

    const context: SessionContext = Object.freeze({
      providerId: spec.id,
      cookies: Object.freeze({ ...seed.cookies }),
      tokens: Object.freeze({ ...seed.tokens }),
      configBlob: seed.configBlob ?? null,
      createdAt: this.now(),
    });
    this.entries.set(spec.id, context);
    log.debug({ provider: spec.id }, 'Session bootstrapped');
    return context;
  }

  /**
   * Mark the provider's context stale. When `stale` is given, only that exact
   * context is dropped, so a newer one published meanwhile survives.
   */
  invalidate(providerId: string, stale?: SessionContext, log: Logger = rootLogger): void {
    const current = this.entries.get(providerId);
    if (!current) return;
    if (stale && current !== stale) return;
    this.entries.delete(providerId);
    log.debug({ provider: providerId }, 'Session invalidated');
  }

  peek(providerId: string): SessionContext | undefined {
    return this.entries.get(providerId);
  }

  isStale(context: SessionContext): boolean {
    return this.now() - context.createdAt >= this.ttlMs;
  }

  clear(): void {
    this.entries.clear();
  }
}
