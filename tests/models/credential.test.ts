import { describe, expect, it } from 'vitest';

import {
  deserializeScopes,
  parsePersistedCredential,
  serializeScopes,
  toPersistedCredential,
} from '../../src/models/credential';

describe('credential persistence format', () => {
  it('writes snake_case fields with an ISO expiry', () => {
    expect(
      toPersistedCredential({
        accessToken: 'access-1',
        refreshToken: 'refresh-1',
        expiresAt: 1_700_000_000_000,
        scope: ['openid', 'offline_access'],
      }),
    ).toEqual({
      access_token: 'access-1',
      refresh_token: 'refresh-1',
      expires_at: '2023-11-14T22:13:20.000Z',
      scope: ['openid', 'offline_access'],
    });
  });

  it.each([
    ['an ISO timestamp', '2023-11-14T22:13:20.000Z'],
    ['epoch seconds', 1_700_000_000],
    ['epoch seconds as a string', '1700000000'],
  ])('reads the expiry from %s', (_label, expiresAt) => {
    const result = parsePersistedCredential({
      access_token: 'access-1',
      refresh_token: 'refresh-1',
      expires_at: expiresAt,
      scope: 'openid offline_access',
    });

    expect(result).toEqual({
      ok: true,
      credential: {
        accessToken: 'access-1',
        refreshToken: 'refresh-1',
        expiresAt: 1_700_000_000_000,
        scope: ['openid', 'offline_access'],
      },
    });
  });

  it('defaults a missing scope to an empty list', () => {
    const result = parsePersistedCredential({
      access_token: 'access-1',
      refresh_token: 'refresh-1',
      expires_at: 1_700_000_000,
    });

    expect(result.ok && result.credential.scope).toEqual([]);
  });

  it('reports issues instead of throwing on malformed input', () => {
    const missingRefresh = parsePersistedCredential({
      access_token: 'access-1',
      expires_at: 1_700_000_000,
    });
    const badExpiry = parsePersistedCredential({
      access_token: 'access-1',
      refresh_token: 'refresh-1',
      expires_at: 'soon',
    });

    expect(missingRefresh.ok).toBe(false);
    expect(badExpiry.ok).toBe(false);
    expect(parsePersistedCredential(null).ok).toBe(false);
  });

  it('serializes scopes space separated', () => {
    expect(serializeScopes(['a', 'b'])).toBe('a b');
    expect(deserializeScopes('  a   b ')).toEqual(['a', 'b']);
    expect(deserializeScopes('')).toEqual([]);
  });
});
