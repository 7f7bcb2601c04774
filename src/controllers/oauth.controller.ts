import { Router } from 'express';

import { authorizationRedirectQuerySchema } from '../models/oauth';
import type { AuthorizationFlow } from '../services/authorizationFlow.service';
import {
  TokenStates,
  type TokenManager,
  type TokenStatus,
} from '../services/tokenManager.service';
import { logger } from '../utils/logger';

const toStatusBody = (status: TokenStatus) => ({
  data: {
    state: status.state,
    expiresAt: status.expiresAt ? status.expiresAt.toISOString() : null,
    scope: status.scope,
  },
});

export const createOAuthRouter = (
  authorizationFlow: AuthorizationFlow,
  tokenManager: Pick<TokenManager, 'status'>,
): Router => {
  const router = Router();

  // `?force` starts a new consent round even while a valid credential is held
  router.get('/oauth.auth', (req, res, next) => {
    try {
      const current = tokenManager.status();
      if (current.state === TokenStates.valid && req.query.force === undefined) {
        res.json(toStatusBody(current));
        return;
      }

      const { url, expiresAt } = authorizationFlow.begin();
      logger.info({ expiresAt }, 'redirecting operator to vendor consent');
      res.redirect(302, url);
    } catch (error) {
      next(error);
    }
  });

  router.get('/oauth.redirect', async (req, res, next) => {
    try {
      const query = authorizationRedirectQuerySchema.parse(req.query);
      const status = await authorizationFlow.complete(query);

      res.json(toStatusBody(status));
    } catch (error) {
      next(error);
    }
  });

  return router;
};
