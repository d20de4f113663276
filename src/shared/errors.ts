// ---------------------------------------------------------------------------
// Mail2SMS — Shared Error Types
// ---------------------------------------------------------------------------
// Startup errors (config, modules, dependencies) abort the process.
// Per-transaction errors (extraction, auth) are resolved into an SMTP reply
// by the gateway and never escape it.
// ---------------------------------------------------------------------------

/**
 * Base class for all gateway errors.
 * Preserves the original error chain via `cause`.
 */
export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

/** Thrown when configuration is invalid or missing. */
export class ConfigError extends GatewayError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

/** Thrown when a module fails to load, initialize, or transition state. */
export class ModuleError extends GatewayError {
  constructor(
    message: string,
    public readonly moduleId: string,
    cause?: Error,
  ) {
    super(message, 'MODULE_ERROR', cause);
    this.name = 'ModuleError';
  }
}

/** Thrown when dependency resolution fails (missing deps, cycles). */
export class DependencyError extends GatewayError {
  constructor(message: string, cause?: Error) {
    super(message, 'DEPENDENCY_ERROR', cause);
    this.name = 'DependencyError';
  }
}

// ── Mail → SMS path ────────────────────────────────────────────────────────

export type ExtractionFailure =
  | 'NoRecipient'
  | 'InvalidRecipientFormat'
  | 'UnsupportedContentType'
  | 'EmptyBody';

/** A mail transaction that cannot become an SMS. Always a permanent failure. */
export class ExtractionError extends GatewayError {
  constructor(
    public readonly kind: ExtractionFailure,
    message: string,
    cause?: Error,
  ) {
    super(message, 'EXTRACTION_ERROR', cause);
    this.name = 'ExtractionError';
  }
}

export type AuthFailure = 'LoginRejected' | 'MalformedResponse' | 'Unreachable';

/** Login against the SMS provider did not yield a session credential. */
export class AuthError extends GatewayError {
  constructor(
    public readonly kind: AuthFailure,
    message: string,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, 'AUTH_ERROR', cause);
    this.name = 'AuthError';
  }
}

/** Normalize an unknown thrown value into an `Error`. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
