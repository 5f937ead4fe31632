export type TelemetryErrorKind =
  | 'CredentialUnavailable'
  | 'TransportFailure'
  | 'AuthenticationFailure'
  | 'ValidationFailure'
  | 'StoreUnavailable'
  | 'InvalidWindow'
  | 'QueryTimeout';

/**
 * Base class for every failure the pipeline reports by kind.
 * `status` is the HTTP status the query API answers with.
 */
export abstract class TelemetryError extends Error {
  abstract readonly kind: TelemetryErrorKind;
  abstract readonly retryable: boolean;
  abstract readonly status: number;
  /** Machine-readable code used in API error bodies. */
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CredentialUnavailableError extends TelemetryError {
  readonly kind = 'CredentialUnavailable' as const;
  readonly retryable = true;
  readonly status = 503;
  readonly code = 'credential_unavailable';
}

export class TransportFailureError extends TelemetryError {
  readonly kind = 'TransportFailure' as const;
  readonly retryable = true;
  readonly status = 502;
  readonly code = 'transport_failure';
}

export class AuthenticationFailureError extends TelemetryError {
  readonly kind = 'AuthenticationFailure' as const;
  readonly retryable = false;
  readonly status = 401;
  readonly code = 'unauthorized';
}

export class ValidationFailureError extends TelemetryError {
  readonly kind = 'ValidationFailure' as const;
  readonly retryable = false;
  readonly status = 400;
  readonly code = 'validation_error';
}

export class StoreUnavailableError extends TelemetryError {
  readonly kind = 'StoreUnavailable' as const;
  readonly retryable = true;
  readonly status = 503;
  readonly code = 'store_unavailable';
}

export class InvalidWindowError extends TelemetryError {
  readonly kind = 'InvalidWindow' as const;
  readonly retryable = false;
  readonly status = 400;
  readonly code = 'invalid_window';
}

export class QueryTimeoutError extends TelemetryError {
  readonly kind = 'QueryTimeout' as const;
  readonly retryable = true;
  readonly status = 504;
  readonly code = 'query_timeout';
}

export function isTelemetryError(err: unknown): err is TelemetryError {
  return err instanceof TelemetryError;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
