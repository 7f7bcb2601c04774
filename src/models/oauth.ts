import { z } from 'zod';

// one year
const MAX_EXPIRES_IN_SECONDS = 31_536_000;

export const tokenEndpointResponseSchema = z.object({
  access_token: z.string().min(1, 'access_token is required'),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.coerce
    .number()
    .finite()
    .positive('expires_in must be positive')
    .max(MAX_EXPIRES_IN_SECONDS, 'expires_in is implausibly large'),
  scope: z.union([z.string(), z.array(z.string())]).optional(),
  token_type: z.string().optional(),
});

export type TokenEndpointResponse = z.infer<typeof tokenEndpointResponseSchema>;

export const oauthErrorBodySchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export const authorizationRedirectQuerySchema = z.object({
  code: z.string().min(1).optional(),
  state: z.string().optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
});

export type AuthorizationRedirectQuery = z.infer<typeof authorizationRedirectQuerySchema>;
