/**
 * Authentication error taxonomy
 */

/**
 * Consumer credentials absent, stored access token incomplete or
 * unparseable, or token past its daily expiry. Recoverable by running the
 * interactive handshake again.
 */
export class CredentialsMissingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CredentialsMissingError';
  }
}

export type HandshakeStep = 'request-token' | 'access-token';

/**
 * Network, HTTP or protocol failure while obtaining a request token or
 * exchanging the verifier. Never retried internally.
 */
export class HandshakeFailedError extends Error {
  constructor(
    message: string,
    public step: HandshakeStep,
    public statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'HandshakeFailedError';
  }
}

/**
 * The idle-renewal call failed; the stored token must be treated as expired.
 */
export class RenewalFailedError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RenewalFailedError';
  }
}

export type NotAuthenticatedReason = 'cancelled' | 'credentials-missing' | 'handshake-failed';

/**
 * No session could be established. The only error the session facade
 * surfaces for authentication problems.
 */
export class NotAuthenticatedError extends Error {
  constructor(
    message: string,
    public reason: NotAuthenticatedReason,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'NotAuthenticatedError';
  }
}
