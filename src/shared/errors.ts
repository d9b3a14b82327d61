export class ResolverError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ResolverError';
  }
}

export class ConfigError extends ResolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

/** No usable source URL in the caller's text, or an unknown provider. */
export class InputError extends ResolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INPUT_ERROR', details);
    this.name = 'InputError';
  }
}

export class UpstreamUnavailableError extends ResolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'UPSTREAM_UNAVAILABLE', details);
    this.name = 'UpstreamUnavailableError';
  }
}

export class SignatureDerivationError extends ResolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SIGNATURE_ERROR', details);
    this.name = 'SignatureDerivationError';
  }
}

/** The upstream reported a processing failure code. Never retried. */
export class ConversionError extends ResolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONVERSION_ERROR', details);
    this.name = 'ConversionError';
  }
}

export class PollTimeoutError extends ResolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'POLL_TIMEOUT', details);
    this.name = 'PollTimeoutError';
  }
}

export class ParseError extends ResolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PARSE_ERROR', details);
    this.name = 'ParseError';
  }
}
