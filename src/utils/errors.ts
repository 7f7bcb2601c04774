export class HttpError extends Error {
  status: number;

  code: string;

  details?: unknown;

  constructor(status: number, code: string, message: string, details?: unknown) {
    super(message);
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export const badRequestError = (message: string, details?: unknown): HttpError =>
  new HttpError(400, 'BAD_REQUEST', message, details);

export const notFoundError = (message: string): HttpError =>
  new HttpError(404, 'NOT_FOUND', message);

export const TokenErrorKinds = {
  unauthenticated: 'UNAUTHENTICATED',
  terminalGrant: 'TERMINAL_GRANT',
  transientNetwork: 'TRANSIENT_NETWORK',
  csrfMismatch: 'CSRF_MISMATCH',
  authorizationRejected: 'AUTHORIZATION_REJECTED',
  corruptState: 'CORRUPT_STATE',
  persistFailed: 'PERSIST_FAILED',
} as const;

export type TokenErrorKind = (typeof TokenErrorKinds)[keyof typeof TokenErrorKinds];

export const REAUTHORIZATION_REQUIRED = 'REAUTHORIZATION_REQUIRED';

/**
 * Failure of the OAuth credential lifecycle, classified by `kind`.
 * Both `UNAUTHENTICATED` and `TERMINAL_GRANT` share the `REAUTHORIZATION_REQUIRED`
 * code: the operator has to walk through `/oauth.auth` again.
 */
export class TokenError extends HttpError {
  kind: TokenErrorKind;

  constructor(
    kind: TokenErrorKind,
    status: number,
    code: string,
    message: string,
    details?: unknown,
  ) {
    super(status, code, message, details);
    this.name = 'TokenError';
    this.kind = kind;
  }
}

export const reauthorizationRequiredError = (
  kind: typeof TokenErrorKinds.unauthenticated | typeof TokenErrorKinds.terminalGrant,
  message: string,
  details?: unknown,
): TokenError => new TokenError(kind, 401, REAUTHORIZATION_REQUIRED, message, details);

export const transientNetworkError = (message: string, details?: unknown): TokenError =>
  new TokenError(
    TokenErrorKinds.transientNetwork,
    503,
    TokenErrorKinds.transientNetwork,
    message,
    details,
  );

export const csrfMismatchError = (message: string): TokenError =>
  new TokenError(TokenErrorKinds.csrfMismatch, 400, TokenErrorKinds.csrfMismatch, message);

export const authorizationRejectedError = (message: string, details?: unknown): TokenError =>
  new TokenError(
    TokenErrorKinds.authorizationRejected,
    400,
    TokenErrorKinds.authorizationRejected,
    message,
    details,
  );

export const corruptStateError = (message: string, details?: unknown): TokenError =>
  new TokenError(
    TokenErrorKinds.corruptState,
    500,
    TokenErrorKinds.corruptState,
    message,
    details,
  );

export const persistFailedError = (message: string, details?: unknown): TokenError =>
  new TokenError(
    TokenErrorKinds.persistFailed,
    500,
    TokenErrorKinds.persistFailed,
    message,
    details,
  );

export const isReauthorizationRequired = (error: unknown): error is TokenError =>
  error instanceof TokenError && error.code === REAUTHORIZATION_REQUIRED;

export const isTokenError = (error: unknown): error is TokenError =>
  error instanceof TokenError;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
