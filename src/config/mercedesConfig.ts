import path from 'path';

import { parseInteger } from './appConfig';

export const OFFLINE_ACCESS_SCOPE = 'offline_access';

const DEFAULT_SCOPES = [
  OFFLINE_ACCESS_SCOPE,
  'mb:vehicle:mbdata:evstatus',
  'mb:vehicle:mbdata:fuelstatus',
  'mb:vehicle:mbdata:payasyoudrive',
  'mb:vehicle:mbdata:vehiclelock',
  'mb:vehicle:mbdata:vehiclestatus',
];

const parseScopes = (value: string | undefined): string[] => {
  if (!value) {
    return [...DEFAULT_SCOPES];
  }

  return value
    .split(',')
    .map((scope) => scope.trim())
    .filter((scope) => scope.length > 0);
};

export const getMercedesConfig = () => {
  const clientId = process.env.MB_CLIENT_ID;
  const clientSecret = process.env.MB_CLIENT_SECRET;
  const vin = process.env.MB_VIN;
  const redirectUri = process.env.MB_REDIRECT_URI;

  if (!clientId || !clientSecret || !vin || !redirectUri) {
    throw new Error(
      'Mercedes-Benz configuration is incomplete. Set MB_CLIENT_ID, MB_CLIENT_SECRET, MB_VIN, and MB_REDIRECT_URI.',
    );
  }

  const scopes = parseScopes(process.env.MB_SCOPES);

  return Object.freeze({
    clientId,
    clientSecret,
    vin,
    redirectUri,
    scopes,
    // offline_access only asks for a refresh token; vendors rarely echo it back
    requiredScopes: scopes.filter((scope) => scope !== OFFLINE_ACCESS_SCOPE),
    authorizationUrl:
      process.env.MB_AUTHORIZATION_URL ||
      'https://id.mercedes-benz.com/as/authorization.oauth2',
    tokenUrl: process.env.MB_TOKEN_URL || 'https://id.mercedes-benz.com/as/token.oauth2',
    apiBaseUrl:
      process.env.MB_API_BASE_URL || 'https://api.mercedes-benz.com/vehicledata/v2',
    tokenTimeoutMs: parseInteger(process.env.MB_TOKEN_TIMEOUT_MS, 10_000),
    apiTimeoutMs: parseInteger(process.env.MB_API_TIMEOUT_MS, 30_000),
    safetyMarginMs: parseInteger(process.env.MB_TOKEN_SAFETY_MARGIN_SECONDS, 30) * 1000,
    authorizationTtlMs: parseInteger(process.env.MB_AUTHORIZATION_TTL_SECONDS, 600) * 1000,
  });
};

export type MercedesConfig = ReturnType<typeof getMercedesConfig>;

export const getTokenStoreConfig = () =>
  Object.freeze({
    statePath: path.resolve(process.cwd(), process.env.TOKEN_STATE_PATH || 'state.json'),
  });

export type TokenStoreConfig = ReturnType<typeof getTokenStoreConfig>;
