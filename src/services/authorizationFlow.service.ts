import { randomBytes, timingSafeEqual } from 'crypto';

import type { AuthorizationRedirectQuery } from '../models/oauth';
import {
  authorizationRejectedError,
  badRequestError,
  csrfMismatchError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import type { TokenManager, TokenStatus } from './tokenManager.service';

export type AuthorizationFlowOptions = {
  tokenManager: Pick<TokenManager, 'completeAuthorization'>;
  authorizationUrl: string;
  clientId: string;
  redirectUri: string;
  scopes: string[];
  attemptTtlMs: number;
  now?: () => number;
  generateState?: () => string;
};

export type PendingAuthorization = {
  state: string;
  expiresAt: number;
};

export type AuthorizationStart = {
  url: string;
  state: string;
  expiresAt: Date;
};

const generateAntiForgeryState = (): string => randomBytes(32).toString('base64url');

const statesMatch = (expected: string, received: string): boolean => {
  const expectedBuffer = Buffer.from(expected);
  const receivedBuffer = Buffer.from(received);
  return (
    expectedBuffer.length === receivedBuffer.length &&
    timingSafeEqual(expectedBuffer, receivedBuffer)
  );
};

/**
 * Browser leg of the authorization-code grant. Holds at most one pending
 * attempt; starting a new one replaces the old, and every completion attempt
 * consumes it.
 */
export class AuthorizationFlow {
  private readonly options: AuthorizationFlowOptions;

  private readonly now: () => number;

  private readonly generateState: () => string;

  private pending: PendingAuthorization | null = null;

  constructor(options: AuthorizationFlowOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
    this.generateState = options.generateState ?? generateAntiForgeryState;
  }

  begin(): AuthorizationStart {
    const state = this.generateState();
    const expiresAt = this.now() + this.options.attemptTtlMs;
    if (this.pending) {
      logger.info('replacing outstanding authorization attempt');
    }
    this.pending = { state, expiresAt };

    const url = new URL(this.options.authorizationUrl);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('client_id', this.options.clientId);
    url.searchParams.set('redirect_uri', this.options.redirectUri);
    url.searchParams.set('scope', this.options.scopes.join(' '));
    url.searchParams.set('state', state);

    logger.info({ expiresAt: new Date(expiresAt).toISOString() }, 'authorization attempt started');
    return { url: url.toString(), state, expiresAt: new Date(expiresAt) };
  }

  hasPendingAttempt(): boolean {
    return this.pending !== null && this.now() < this.pending.expiresAt;
  }

  async complete(query: AuthorizationRedirectQuery): Promise<TokenStatus> {
    const { pending } = this;
    this.pending = null;

    if (!pending) {
      throw csrfMismatchError('No authorization attempt is pending. Start again at /oauth.auth.');
    }

    if (this.now() >= pending.expiresAt) {
      throw csrfMismatchError('The authorization attempt expired. Start again at /oauth.auth.');
    }

    if (!query.state || !statesMatch(pending.state, query.state)) {
      logger.warn('authorization redirect state mismatch');
      throw csrfMismatchError('The state parameter does not match the pending authorization.');
    }

    if (query.error) {
      throw authorizationRejectedError(
        `Authorization denied by the vendor: ${query.error}${
          query.error_description ? ` (${query.error_description})` : ''
        }`,
        { error: query.error, error_description: query.error_description },
      );
    }

    if (!query.code) {
      throw badRequestError('Missing authorization code.');
    }

    return this.options.tokenManager.completeAuthorization(query.code);
  }
}
