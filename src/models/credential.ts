import { z } from 'zod';

/**
 * The single live OAuth credential. `expiresAt` is epoch milliseconds and
 * already has the safety margin subtracted, so a token is usable while
 * `now < expiresAt`.
 */
export type Credential = {
  accessToken: string;
  refreshToken: string;
  expiresAt: number;
  scope: string[];
};

export const serializeScopes = (scopes: string[]): string => scopes.join(' ');

export const deserializeScopes = (scopes: string): string[] =>
  scopes
    .split(/\s+/)
    .map((scope) => scope.trim())
    .filter((scope) => scope.length > 0);

const scopeSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) =>
    Array.isArray(value)
      ? value.map((scope) => scope.trim()).filter((scope) => scope.length > 0)
      : deserializeScopes(value),
  );

const epochSecondsPattern = /^\d+(\.\d+)?$/;

// ECMAScript Date range
const MAX_DATE_MS = 8.64e15;

// ISO-8601 strings, epoch seconds, or epoch seconds written as a string.
const expiresAtSchema = z.union([z.number(), z.string()]).transform((value, context) => {
  const millis =
    typeof value === 'number' || epochSecondsPattern.test(value)
      ? Number(value) * 1000
      : Date.parse(value);

  if (!Number.isFinite(millis) || Math.abs(millis) > MAX_DATE_MS) {
    context.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'expires_at must be ISO-8601 or epoch seconds within the Date range',
    });
    return z.NEVER;
  }

  return millis;
});

export const persistedCredentialSchema = z.object({
  access_token: z.string().min(1, 'access_token is required'),
  refresh_token: z.string().min(1, 'refresh_token is required'),
  expires_at: expiresAtSchema,
  scope: scopeSchema.default([]),
});

export type PersistedCredential = {
  access_token: string;
  refresh_token: string;
  expires_at: string;
  scope: string[];
};

export const toPersistedCredential = (credential: Credential): PersistedCredential => ({
  access_token: credential.accessToken,
  refresh_token: credential.refreshToken,
  expires_at: new Date(credential.expiresAt).toISOString(),
  scope: [...credential.scope],
});

export type CredentialParseResult =
  | { ok: true; credential: Credential }
  | { ok: false; issues: z.ZodIssue[] };

export const parsePersistedCredential = (input: unknown): CredentialParseResult => {
  const result = persistedCredentialSchema.safeParse(input);
  if (!result.success) {
    return { ok: false, issues: result.error.issues };
  }

  return {
    ok: true,
    credential: {
      accessToken: result.data.access_token,
      refreshToken: result.data.refresh_token,
      expiresAt: result.data.expires_at,
      scope: result.data.scope,
    },
  };
};

export const copyCredential = (credential: Credential): Credential => ({
  ...credential,
  scope: [...credential.scope],
});
