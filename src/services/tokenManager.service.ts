import type { TokenStore } from '../db/tokenStore';
import {
  TokenEndpointError,
  type TokenGrantClient,
} from '../integrations/mercedes/tokenEndpoint.client';
import { copyCredential, deserializeScopes, type Credential } from '../models/credential';
import type { TokenEndpointResponse } from '../models/oauth';
import {
  TokenErrorKinds,
  authorizationRejectedError,
  describeError,
  isTokenError,
  persistFailedError,
  reauthorizationRequiredError,
  transientNetworkError,
  type TokenError,
} from '../utils/errors';
import { logger } from '../utils/logger';

export const TokenStates = {
  unauthenticated: 'UNAUTHENTICATED',
  valid: 'AUTHENTICATED_VALID',
  expired: 'AUTHENTICATED_EXPIRED',
  refreshing: 'REFRESHING',
} as const;

export type TokenState = (typeof TokenStates)[keyof typeof TokenStates];

export type TokenStatus = {
  state: TokenState;
  expiresAt: Date | null;
  scope: string[];
};

export type TokenManagerOptions = {
  store: TokenStore;
  grants: TokenGrantClient;
  requiredScopes: string[];
  safetyMarginMs: number;
  now?: () => number;
};

// OAuth errors meaning the grant itself is gone; anything else may heal on retry.
const TERMINAL_OAUTH_ERRORS = new Set(['invalid_grant', 'unauthorized_client']);

const classifyRefreshFailure = (error: unknown): TokenError => {
  if (isTokenError(error)) {
    return error;
  }

  if (error instanceof TokenEndpointError && error.oauthError) {
    const details = {
      status: error.status,
      error: error.oauthError,
      error_description: error.description,
    };
    if (TERMINAL_OAUTH_ERRORS.has(error.oauthError)) {
      return reauthorizationRequiredError(
        TokenErrorKinds.terminalGrant,
        `Refresh token rejected by the vendor (${error.oauthError}). Re-authorize via /oauth.auth.`,
        details,
      );
    }

    return transientNetworkError(`Token refresh failed: ${error.message}`, details);
  }

  const status = error instanceof TokenEndpointError ? error.status : undefined;
  return transientNetworkError(`Token refresh failed: ${describeError(error)}`, { status });
};

const classifyAuthorizationFailure = (error: unknown): TokenError => {
  if (isTokenError(error)) {
    return error;
  }

  if (
    error instanceof TokenEndpointError &&
    error.status !== undefined &&
    error.status >= 400 &&
    error.status < 500
  ) {
    return authorizationRejectedError(
      `Authorization code exchange rejected: ${error.oauthError ?? `HTTP ${error.status}`}${
        error.description ? ` (${error.description})` : ''
      }`,
      {
        status: error.status,
        error: error.oauthError,
        error_description: error.description,
      },
    );
  }

  const status = error instanceof TokenEndpointError ? error.status : undefined;
  return transientNetworkError(`Authorization code exchange failed: ${describeError(error)}`, {
    status,
  });
};

/**
 * Owns the single live credential. Node runs every transition on one thread,
 * so the synchronous stretches between awaits form the mutual-exclusion
 * domain; nothing outside this class reads the credential fields.
 */
export class TokenManager {
  private readonly store: TokenStore;

  private readonly grants: TokenGrantClient;

  private readonly requiredScopes: string[];

  private readonly safetyMarginMs: number;

  private readonly now: () => number;

  private credential: Credential | null = null;

  private inFlightRefresh: Promise<string> | null = null;

  // bumped whenever the credential is replaced or dropped outside a refresh
  private generation = 0;

  private writes: Promise<void> = Promise.resolve();

  // a revoked credential whose removal from the store has not succeeded yet
  private staleCredentialStored = false;

  constructor(options: TokenManagerOptions) {
    this.store = options.store;
    this.grants = options.grants;
    this.requiredScopes = [...options.requiredScopes];
    this.safetyMarginMs = options.safetyMarginMs;
    this.now = options.now ?? Date.now;
  }

  static async create(options: TokenManagerOptions): Promise<TokenManager> {
    const manager = new TokenManager(options);
    await manager.restore();
    return manager;
  }

  async restore(): Promise<TokenState> {
    const stored = await this.store.load();
    this.credential = stored;
    this.generation += 1;

    const state = this.getState();
    logger.info(
      {
        store: this.store.describe(),
        state,
        expiresAt: stored ? new Date(stored.expiresAt).toISOString() : null,
      },
      'token manager restored',
    );
    return state;
  }

  getState(): TokenState {
    if (!this.credential) {
      return TokenStates.unauthenticated;
    }

    if (this.inFlightRefresh) {
      return TokenStates.refreshing;
    }

    return this.isExpired(this.credential) ? TokenStates.expired : TokenStates.valid;
  }

  status(): TokenStatus {
    return {
      state: this.getState(),
      expiresAt: this.credential ? new Date(this.credential.expiresAt) : null,
      scope: this.credential ? [...this.credential.scope] : [],
    };
  }

  /**
   * Returns an access token that is not past its (margin-adjusted) expiry.
   * Concurrent callers arriving while a refresh is running share its outcome.
   */
  async getValidToken(): Promise<string> {
    if (this.inFlightRefresh) {
      return this.inFlightRefresh;
    }

    const { credential } = this;
    if (!credential) {
      if (this.staleCredentialStored) {
        await this.retryStaleClear();
      }

      throw reauthorizationRequiredError(
        TokenErrorKinds.unauthenticated,
        'No credential is available. Authorize via /oauth.auth.',
      );
    }

    if (!this.isExpired(credential)) {
      return credential.accessToken;
    }

    const refresh = this.refresh(credential).finally(() => {
      this.inFlightRefresh = null;
    });
    this.inFlightRefresh = refresh;
    return refresh;
  }

  /**
   * The vendor answered 401 to `rejectedAccessToken`. Forces a refresh unless the
   * live token has already moved on.
   */
  async refreshAfterRejection(rejectedAccessToken: string): Promise<string> {
    if (this.inFlightRefresh) {
      return this.inFlightRefresh;
    }

    const { credential } = this;
    if (credential && credential.accessToken === rejectedAccessToken) {
      logger.warn('vendor rejected an unexpired access token; forcing refresh');
      this.credential = { ...credential, expiresAt: Math.min(credential.expiresAt, this.now()) };
    }

    return this.getValidToken();
  }

  async completeAuthorization(code: string): Promise<TokenStatus> {
    let response: TokenEndpointResponse;
    try {
      response = await this.grants.exchangeCode(code);
    } catch (error) {
      const classified = classifyAuthorizationFailure(error);
      logger.warn({ kind: classified.kind, details: classified.details }, 'code exchange failed');
      throw classified;
    }

    if (!response.refresh_token) {
      throw authorizationRejectedError(
        'The vendor issued no refresh_token. Request the offline_access scope and authorize again.',
      );
    }

    const scope = this.grantedScopes(response, this.requiredScopes);
    const missing = this.missingScopes(scope);
    if (missing.length > 0) {
      throw authorizationRejectedError('The granted scope is missing required scopes.', {
        missing,
        granted: scope,
      });
    }

    const next: Credential = {
      accessToken: response.access_token,
      refreshToken: response.refresh_token,
      expiresAt: this.computeExpiry(response.expires_in),
      scope,
    };

    this.credential = next;
    this.generation += 1;
    this.staleCredentialStored = false;
    logger.info(
      { expiresAt: new Date(next.expiresAt).toISOString(), scope },
      'authorization completed',
    );

    await this.persistSave(next);
    return this.status();
  }

  private async refresh(credential: Credential): Promise<string> {
    const { generation } = this;
    logger.debug({ expiresAt: new Date(credential.expiresAt).toISOString() }, 'refreshing');

    let response: TokenEndpointResponse;
    try {
      response = await this.grants.exchangeRefreshToken(credential.refreshToken);
    } catch (error) {
      const classified = classifyRefreshFailure(error);
      if (generation !== this.generation) {
        return this.supersededToken();
      }

      if (classified.kind === TokenErrorKinds.terminalGrant) {
        logger.error({ details: classified.details }, 'refresh grant revoked; credential cleared');
        this.credential = null;
        this.generation += 1;
        try {
          await this.persistClear();
        } catch (clearError) {
          // the revoked grant is still the error the caller has to act on
          this.staleCredentialStored = true;
          logger.warn({ err: clearError }, 'revoked credential remains stored; clear will be retried');
        }
      } else {
        logger.warn({ details: classified.details }, 'transient refresh failure');
      }

      throw classified;
    }

    if (generation !== this.generation) {
      return this.supersededToken();
    }

    const scope = this.grantedScopes(response, credential.scope);
    const missing = this.missingScopes(scope);
    if (missing.length > 0) {
      logger.warn({ missing, granted: scope }, 'refreshed token lacks required scopes');
    }

    const next: Credential = {
      accessToken: response.access_token,
      // absent in the response means the old refresh token stays valid
      refreshToken: response.refresh_token ?? credential.refreshToken,
      expiresAt: this.computeExpiry(response.expires_in),
      scope,
    };

    this.credential = next;
    logger.info(
      {
        expiresAt: new Date(next.expiresAt).toISOString(),
        rotated: next.refreshToken !== credential.refreshToken,
      },
      'access token refreshed',
    );

    await this.persistSave(next);
    return next.accessToken;
  }

  // re-authorized (or cleared) while a refresh was on the wire
  private supersededToken(): string {
    logger.info('discarding refresh outcome superseded by a newer credential');
    if (!this.credential) {
      throw reauthorizationRequiredError(
        TokenErrorKinds.unauthenticated,
        'No credential is available. Authorize via /oauth.auth.',
      );
    }

    return this.credential.accessToken;
  }

  private async retryStaleClear(): Promise<void> {
    this.staleCredentialStored = false;
    try {
      await this.persistClear();
      logger.info('revoked credential removed from the store');
    } catch (error) {
      this.staleCredentialStored = true;
      logger.warn({ err: error }, 'revoked credential still stored');
    }
  }

  private isExpired(credential: Credential): boolean {
    return this.now() >= credential.expiresAt;
  }

  private computeExpiry(expiresInSeconds: number): number {
    // whole milliseconds: the store keeps ISO-8601
    return Math.floor(this.now() + expiresInSeconds * 1000 - this.safetyMarginMs);
  }

  private grantedScopes(response: TokenEndpointResponse, fallback: string[]): string[] {
    if (response.scope === undefined) {
      return [...fallback];
    }

    const granted = Array.isArray(response.scope)
      ? response.scope.map((scope) => scope.trim()).filter((scope) => scope.length > 0)
      : deserializeScopes(response.scope);

    return granted.length > 0 ? granted : [...fallback];
  }

  private missingScopes(granted: string[]): string[] {
    return this.requiredScopes.filter((scope) => !granted.includes(scope));
  }

  private persistSave(credential: Credential): Promise<void> {
    const snapshot = copyCredential(credential);
    return this.enqueueWrite(() => this.store.save(snapshot), 'save');
  }

  private persistClear(): Promise<void> {
    return this.enqueueWrite(() => this.store.clear(), 'clear');
  }

  // Writes land in transition order; a failure surfaces to its own caller only.
  private enqueueWrite(operation: () => Promise<void>, action: string): Promise<void> {
    const write = this.writes.then(operation).catch((error: unknown) => {
      logger.error({ action, err: error, store: this.store.describe() }, 'credential write failed');
      throw persistFailedError(`Could not ${action} the persisted credential.`, {
        reason: describeError(error),
      });
    });
    this.writes = write.then(
      () => undefined,
      () => undefined,
    );
    return write;
  }
}
