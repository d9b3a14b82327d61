import type { HttpClient } from '../http/client.js';
import type { MediaDraft } from '../normalize/result.js';
import type { SessionContext, SessionSeed } from '../session/sessionManager.js';
import type { SigningKey } from '../signature/cipher.js';
import type { ResolutionStateMachine } from '../engine/stateMachine.js';
import type { Logger } from '../shared/logger.js';
import type { ProviderSpec } from './schema.js';

/**
 * A URL found in caller text, normalized, plus the provider it matched.
 */
export interface SourceUrl {
  url: string;
  spec: ProviderSpec;
}

/** Tunables shared by every provider's protocol. */
export interface EngineSettings {
  pollIntervalMs: number;
  pollMaxAttempts: number;
  maxRedirectHops: number;
}

export interface SignedSession {
  session: SessionContext;
  key: SigningKey;
}

/**
 * Everything one resolution may use. Built per call by the resolver and
 * discarded when it returns.
 */
export interface ResolutionContext {
  readonly spec: ProviderSpec;
  readonly source: SourceUrl;
  readonly http: HttpClient;
  readonly settings: EngineSettings;
  readonly state: ResolutionStateMachine;
  readonly signal: AbortSignal;
  readonly log: Logger;
  /** Cached or freshly bootstrapped session for this provider. */
  acquireSession(): Promise<SessionContext>;
  invalidateSession(stale: SessionContext): void;
  /**
   * Session plus its signing key. A cipher that fails to derive forces one
   * session refresh before the error surfaces.
   */
  acquireSignedSession(): Promise<SignedSession>;
}

/**
 * Per-provider behavior. URL patterns come from the provider's spec; the
 * rest lives here.
 */
export interface ProviderStrategy<TRaw = unknown> {
  readonly id: string;
  /** Handshake with the helper site. Providers without one never hold a session. */
  bootstrap?(spec: ProviderSpec, http: HttpClient, signal: AbortSignal): Promise<SessionSeed>;
  sign?(session: SessionContext): SigningKey;
  orchestrate(ctx: ResolutionContext): Promise<TRaw>;
  normalize(raw: TRaw, source: SourceUrl): MediaDraft;
}
