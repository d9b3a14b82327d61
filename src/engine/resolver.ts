import type { Config } from '../shared/config.js';
import { ConfigError, InputError, ResolverError, SignatureDerivationError, UpstreamUnavailableError } from '../shared/errors.js';
import { logger, type Logger } from '../shared/logger.js';
import { generateId } from '../shared/utils.js';
import { HttpClient, httpOptionsFromConfig } from '../http/client.js';
import { SessionManager, type SessionContext } from '../session/sessionManager.js';
import { SignatureEngine } from '../signature/engine.js';
import { extractSourceUrl } from '../extract/urlExtractor.js';
import { errorResult, toMediaResult, type MediaResult } from '../normalize/result.js';
import type { ProviderSpec } from '../provider/schema.js';
import type {
  EngineSettings,
  ProviderStrategy,
  ResolutionContext,
  SignedSession,
  SourceUrl,
} from '../provider/adapter.js';
import { defaultStrategies } from '../provider/registry.js';
import { ResolutionStateMachine } from './stateMachine.js';

export interface ResolveOptions {
  /** Wall-clock budget for the whole resolution. */
  deadlineMs?: number;
  signal?: AbortSignal;
}

export function engineSettingsFromConfig(config: Config): EngineSettings {
  return {
    pollIntervalMs: config.poll.interval_ms,
    pollMaxAttempts: config.poll.max_attempts,
    maxRedirectHops: config.redirect.max_hops,
  };
}

/**
 * Engine entry point. Owns the process-wide session and signing-key caches;
 * every other piece of state lives for one `resolve` call.
 */
export class Resolver {
  readonly sessions: SessionManager;
  private readonly signatures = new SignatureEngine();
  private readonly http: HttpClient;
  private readonly settings: EngineSettings;
  private readonly byId: ReadonlyMap<string, ProviderSpec>;

  constructor(
    config: Config,
    private readonly specs: readonly ProviderSpec[],
    private readonly strategies: ReadonlyMap<string, ProviderStrategy> = defaultStrategies,
  ) {
    for (const spec of specs) {
      if (!strategies.has(spec.id)) {
        throw new ConfigError(`No strategy implements provider ${spec.id}`);
      }
    }
    this.byId = new Map(specs.map((spec) => [spec.id, spec]));
    this.sessions = new SessionManager(config.session.ttl_ms);
    this.http = new HttpClient(httpOptionsFromConfig(config.http));
    this.settings = engineSettingsFromConfig(config);
  }

  providers(): readonly ProviderSpec[] {
    return this.specs;
  }

  /**
   * Resolve the first `providerId` link in `rawText`. Classified failures come
   * back as error results; only defects throw.
   */
  async resolve(providerId: string, rawText: string, options: ResolveOptions = {}): Promise<MediaResult> {
    const spec = this.byId.get(providerId);
    if (!spec) {
      return errorResult(new InputError(`Unknown provider: ${providerId}`));
    }
    return this.run([spec], rawText, options);
  }

  /** Like `resolve`, trying every provider in priority order. */
  async resolveAny(rawText: string, options: ResolveOptions = {}): Promise<MediaResult> {
    return this.run(this.specs, rawText, options);
  }

  private async run(
    candidates: readonly ProviderSpec[],
    rawText: string,
    options: ResolveOptions,
  ): Promise<MediaResult> {
    const requestId = generateId(10);
    let log: Logger = logger.child({ requestId });
    let state: ResolutionStateMachine | null = null;
    const signal = composeSignal(options);

    try {
      const source = extractSourceUrl(rawText, candidates);
      log = log.child({ provider: source.spec.id });
      const strategy = this.strategyFor(source.spec.id);
      state = new ResolutionStateMachine(log);
      const ctx = this.createContext(source, strategy, state, signal, log);

      log.debug({ url: source.url }, 'Resolving');
      const raw = await strategy.orchestrate(ctx);
      const result = toMediaResult(strategy.normalize(raw, source), source.url);
      state.advance('ready');

      log.info({ url: source.url, formats: result.data?.formats.length }, 'Resolved');
      return result;
    } catch (err) {
      state?.fail();
      const classified = classify(err, signal);
      if (!classified) throw err;
      log.warn({ code: classified.code, error: classified.message }, 'Resolution failed');
      return errorResult(classified);
    }
  }

  private strategyFor(providerId: string): ProviderStrategy {
    const strategy = this.strategies.get(providerId);
    if (!strategy) {
      throw new ConfigError(`No strategy implements provider ${providerId}`);
    }
    return strategy;
  }

  private createContext(
    source: SourceUrl,
    strategy: ProviderStrategy,
    state: ResolutionStateMachine,
    signal: AbortSignal,
    log: Logger,
  ): ResolutionContext {
    const { spec } = source;
    const http = this.http.withLogger(log);
    const sessions = this.sessions;
    const signatures = this.signatures;

    const acquireSession = async (): Promise<SessionContext> => {
      const bootstrap = strategy.bootstrap;
      if (!bootstrap) {
        throw new ConfigError(`Provider ${spec.id} has no session bootstrap`);
      }
      const session = await sessions.acquire(
        spec,
        (bootSignal) => bootstrap.call(strategy, spec, http, bootSignal),
        signal,
        log,
      );
      state.advance('session_ready');
      return session;
    };

    const invalidateSession = (stale: SessionContext): void => {
      sessions.invalidate(spec.id, stale, log);
    };

    const signedWith = (session: SessionContext): string => {
      const sign = strategy.sign;
      return sign ? signatures.signingKey(session, (s) => sign.call(strategy, s)) : signatures.signingKey(session);
    };

    const acquireSignedSession = async (): Promise<SignedSession> => {
      const session = await acquireSession();
      try {
        return { session, key: signedWith(session) };
      } catch (err) {
        if (!(err instanceof SignatureDerivationError)) throw err;
        log.info({ error: err.message }, 'Signature derivation failed, refreshing session once');
        invalidateSession(session);
        const fresh = await acquireSession();
        return { session: fresh, key: signedWith(fresh) };
      }
    };

    return {
      spec,
      source,
      http,
      settings: this.settings,
      state,
      signal,
      log,
      acquireSession,
      invalidateSession,
      acquireSignedSession,
    };
  }
}

function composeSignal(options: ResolveOptions): AbortSignal {
  const signals: AbortSignal[] = [];
  if (options.signal) signals.push(options.signal);
  if (options.deadlineMs !== undefined) signals.push(AbortSignal.timeout(options.deadlineMs));
  if (signals.length === 0) return new AbortController().signal;
  return signals.length === 1 && signals[0] ? signals[0] : AbortSignal.any(signals);
}

function classify(err: unknown, signal: AbortSignal): ResolverError | null {
  if (err instanceof ConfigError) return null;
  if (err instanceof ResolverError) return err;
  if (signal.aborted) {
    return new UpstreamUnavailableError('Resolution deadline exceeded');
  }
  return null;
}

let resolverInstance: Resolver | null = null;

export function initResolver(config: Config, specs: readonly ProviderSpec[]): Resolver {
  resolverInstance = new Resolver(config, specs);
  return resolverInstance;
}

export function getResolver(): Resolver {
  if (!resolverInstance) {
    throw new ConfigError('Resolver not initialized. Call initResolver() first.');
  }
  return resolverInstance;
}

export function resetResolver(): void {
  resolverInstance = null;
}
