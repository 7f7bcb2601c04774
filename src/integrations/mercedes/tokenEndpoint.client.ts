import { FetchError, ofetch, type $Fetch } from 'ofetch';

import {
  oauthErrorBodySchema,
  tokenEndpointResponseSchema,
  type TokenEndpointResponse,
} from '../../models/oauth';
import { describeError } from '../../utils/errors';
import { logger } from '../../utils/logger';

export type TokenEndpointErrorDetails = {
  status?: number;
  oauthError?: string;
  description?: string;
  cause?: unknown;
};

/**
 * Raw failure from the vendor token endpoint. `status` is undefined when no
 * response arrived (timeout, connection refused, DNS).
 */
export class TokenEndpointError extends Error {
  readonly status?: number;

  readonly oauthError?: string;

  readonly description?: string;

  constructor(message: string, details: TokenEndpointErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.name = 'TokenEndpointError';
    this.status = details.status;
    this.oauthError = details.oauthError;
    this.description = details.description;
  }

  get receivedResponse(): boolean {
    return this.status !== undefined;
  }
}

export interface TokenGrantClient {
  exchangeCode(code: string): Promise<TokenEndpointResponse>;
  exchangeRefreshToken(refreshToken: string): Promise<TokenEndpointResponse>;
}

export type TokenEndpointClientOptions = {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  timeoutMs: number;
};

type GrantName = 'authorization_code' | 'refresh_token';

const toEndpointError = (grant: GrantName, error: unknown): TokenEndpointError => {
  if (error instanceof FetchError && error.response) {
    const status = error.response.status;
    const body = oauthErrorBodySchema.safeParse(error.data);
    const oauthError = body.success ? body.data.error : undefined;
    const description = body.success ? body.data.error_description : undefined;
    const summary = oauthError
      ? `${oauthError}${description ? ` (${description})` : ''}`
      : `HTTP ${status}`;

    return new TokenEndpointError(`${grant} grant rejected: ${summary}`, {
      status,
      oauthError,
      description,
      cause: error,
    });
  }

  return new TokenEndpointError(
    `${grant} grant failed without a response: ${describeError(error)}`,
    { cause: error },
  );
};

export class MercedesTokenClient implements TokenGrantClient {
  private readonly options: TokenEndpointClientOptions;

  private readonly fetcher: $Fetch;

  constructor(options: TokenEndpointClientOptions) {
    this.options = options;
    this.fetcher = ofetch.create({ timeout: options.timeoutMs, retry: 0 });
  }

  exchangeCode(code: string): Promise<TokenEndpointResponse> {
    return this.requestToken('authorization_code', {
      code,
      redirect_uri: this.options.redirectUri,
    });
  }

  exchangeRefreshToken(refreshToken: string): Promise<TokenEndpointResponse> {
    return this.requestToken('refresh_token', { refresh_token: refreshToken });
  }

  private async requestToken(
    grant: GrantName,
    params: Record<string, string>,
  ): Promise<TokenEndpointResponse> {
    const body = new URLSearchParams({
      grant_type: grant,
      ...params,
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
    }).toString();

    let payload: unknown;
    try {
      payload = await this.fetcher<unknown>(this.options.tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body,
      });
    } catch (error) {
      const endpointError = toEndpointError(grant, error);
      logger.warn(
        {
          grant,
          status: endpointError.status,
          oauthError: endpointError.oauthError,
        },
        'token endpoint request failed',
      );
      throw endpointError;
    }

    const parsed = tokenEndpointResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TokenEndpointError(`${grant} grant returned a malformed token response`, {
        cause: parsed.error,
      });
    }

    logger.debug(
      { grant, expiresIn: parsed.data.expires_in, rotated: Boolean(parsed.data.refresh_token) },
      'token endpoint request succeeded',
    );
    return parsed.data;
  }
}
