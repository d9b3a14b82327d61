import type { SessionContext } from '../session/sessionManager.js';
import { SignatureDerivationError } from '../shared/errors.js';
import { deriveSigningToken, type SigningKey } from './cipher.js';

export type KeyDerivation = (session: SessionContext) => SigningKey;

/** Derive from the session's config blob with the default cipher. */
export const deriveFromConfigBlob: KeyDerivation = (session) => {
  if (!session.configBlob) {
    throw new SignatureDerivationError('Session carries no cipher config blob', {
      provider: session.providerId,
    });
  }
  return deriveSigningToken(session.configBlob);
};

/**
 * Memoizes one signing key per session context. A refreshed context is a new
 * object, so its key is recomputed; the old one is collected with it.
 */
export class SignatureEngine {
  private readonly keys = new WeakMap<SessionContext, SigningKey>();

  signingKey(session: SessionContext, derive: KeyDerivation = deriveFromConfigBlob): SigningKey {
    const cached = this.keys.get(session);
    if (cached !== undefined) return cached;
    const key = derive(session);
    this.keys.set(session, key);
    return key;
  }
}
