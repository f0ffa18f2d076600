/**
 * Store failure taxonomy
 *
 * Adapters translate backend-specific failures into these classes. Only
 * {@link CredentialExpiredError} is recoverable (refresh, then retry once);
 * everything else means the store is unusable for this request.
 *
 * @public
 */
export abstract class StoreError extends Error {
  abstract readonly kind: 'credential_expired' | 'credentials_missing' | 'unavailable' | 'client';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The session token has expired; a fresh session may succeed. */
export class CredentialExpiredError extends StoreError {
  readonly kind = 'credential_expired' as const;
}

/** No credentials could be resolved at all. */
export class CredentialsMissingError extends StoreError {
  readonly kind = 'credentials_missing' as const;
}

/** Network failure, throttling or outage. */
export class StoreUnavailableError extends StoreError {
  readonly kind = 'unavailable' as const;
}

/** The backend rejected the request. */
export class StoreClientError extends StoreError {
  readonly kind = 'client' as const;

  constructor(readonly code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function isCredentialExpired(error: unknown): error is CredentialExpiredError {
  return error instanceof CredentialExpiredError;
}
