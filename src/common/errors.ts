/**
 * Failure taxonomy for the collector.
 *
 * Sources hand these back as values inside a `Result`; sinks and the
 * persisted stores throw them.
 */
export type CollectorErrorKind =
  | 'transport'
  | 'auth'
  | 'rate_limit'
  | 'partial_data'
  | 'persistence';

export abstract class CollectorError extends Error {
  abstract readonly kind: CollectorErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Network error, timeout or upstream 5xx
 */
export class TransportFailure extends CollectorError {
  readonly kind = 'transport';
}

/**
 * Expired or invalid credentials
 */
export class AuthFailure extends CollectorError {
  readonly kind = 'auth';
}

/**
 * Quota policy hit, either locally by the governor or signalled upstream (HTTP 429)
 */
export class RateLimitExceeded extends CollectorError {
  readonly kind = 'rate_limit';
}

/**
 * The call succeeded but the payload is unusable
 */
export class PartialDataFailure extends CollectorError {
  readonly kind = 'partial_data';
}

/**
 * A sink or persisted store could not complete a durable write or read
 */
export class PersistenceFailure extends CollectorError {
  readonly kind = 'persistence';
}

export type SourceFailure =
  | TransportFailure
  | AuthFailure
  | RateLimitExceeded
  | PartialDataFailure;

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function toPersistenceFailure(action: string, error: unknown): PersistenceFailure {
  if (error instanceof PersistenceFailure) {
    return error;
  }
  return new PersistenceFailure(`${action}: ${describeError(error)}`, { cause: error });
}
