export type UpdetoErrorKind = 'network' | 'badServerResponse' | 'decoding';

/** Sentinel status used when no HTTP response could be obtained. */
export const NO_RESPONSE_STATUS = -1;

export abstract class UpdetoError extends Error {
  abstract readonly kind: UpdetoErrorKind;
}

export class NetworkError extends UpdetoError {
  readonly kind = 'network' as const;

  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Lookup request failed: ${detail}`, { cause });
    this.name = 'NetworkError';
  }
}

export class BadServerResponseError extends UpdetoError {
  readonly kind = 'badServerResponse' as const;
  readonly statusCode: number;

  constructor(statusCode: number) {
    super(
      statusCode === NO_RESPONSE_STATUS
        ? 'Lookup returned no HTTP response'
        : `Lookup responded HTTP ${statusCode}`,
    );
    this.name = 'BadServerResponseError';
    this.statusCode = statusCode;
  }
}

export class DecodingError extends UpdetoError {
  readonly kind = 'decoding' as const;

  constructor(cause?: unknown) {
    super('Lookup payload could not be decoded', { cause });
    this.name = 'DecodingError';
  }
}

export type LookupFailure = NetworkError | BadServerResponseError | DecodingError;

export function isLookupFailure(error: unknown): error is LookupFailure {
  return (
    error instanceof NetworkError ||
    error instanceof BadServerResponseError ||
    error instanceof DecodingError
  );
}

/** Wraps anything a provider threw into the error taxonomy. */
export function toLookupFailure(error: unknown): LookupFailure {
  return isLookupFailure(error) ? error : new NetworkError(error);
}
