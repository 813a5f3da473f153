/**
 * errors.ts: Error classes raised below the component boundary.
 *
 * Components never let these escape their public operations: the
 * Authenticator, NavigationController and SessionStore catch them and
 * return typed outcomes instead.  Each class carries a `kind` so outcome
 * objects and log lines can name the failure without `instanceof` chains.
 */

/** Browser engine or navigation failure.  Fatal for the current attempt. */
export class TransportError extends Error {
  readonly kind = 'TransportError' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/** Disk read/write failure inside the session directory. */
export class PersistenceIOError extends Error {
  readonly kind = 'PersistenceIOError' as const;
  /** The artifact path that failed. */
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceIOError';
    this.path = path;
  }
}

/** Settings file or environment produced an invalid configuration. */
export class ConfigError extends Error {
  readonly kind = 'ConfigError' as const;
  /** One entry per failing setting, e.g. `targetSite.baseUrl: Invalid url`. */
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Extract a printable message from anything thrown. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Normalise anything thrown during a browser step into a TransportError.
 * Already-typed transport errors pass through unchanged.
 */
export function toTransportError(err: unknown, step: string): TransportError {
  if (err instanceof TransportError) return err;
  return new TransportError(`${step}: ${describeError(err)}`, { cause: err });
}
