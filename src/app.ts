import { randomUUID } from 'crypto';
import express, { Application } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import pinoHttp from 'pino-http';

import { getAppConfig, type AppConfig } from './config/appConfig';
import { createMetricsRouter } from './controllers/metrics.controller';
import { createOAuthRouter } from './controllers/oauth.controller';
import { errorHandler } from './middleware/errorHandler.middleware';
import type { AuthorizationFlow } from './services/authorizationFlow.service';
import type { MetricsCollector } from './services/metricsCollector.service';
import { TokenStates, type TokenManager } from './services/tokenManager.service';
import { logger } from './utils/logger';

export type AppServices = {
  tokenManager: Pick<TokenManager, 'status'>;
  authorizationFlow: AuthorizationFlow;
  metricsCollector: MetricsCollector;
};

type RequestWithId = { id?: unknown };

const extractRequestId = (req: RequestWithId): string | undefined =>
  typeof req.id === 'string' ? req.id : undefined;

export const createApp = (
  services: AppServices,
  appConfig: AppConfig = getAppConfig(),
): Application => {
  const app = express();

  const redactPaths = appConfig.logging.redactHeaders.map((header) => {
    const sanitized = header.toLowerCase();
    return /^[a-z0-9_]+$/.test(sanitized)
      ? `req.headers.${sanitized}`
      : `req.headers["${sanitized}"]`;
  });

  app.use(
    pinoHttp({
      logger,
      genReqId: (req, res) => {
        const incomingHeader = req.headers[appConfig.requestIdHeader];
        const candidate = Array.isArray(incomingHeader)
          ? incomingHeader[0]
          : incomingHeader;
        const requestId = candidate && candidate.length > 0 ? candidate : randomUUID();
        res.setHeader(appConfig.requestIdHeader, requestId);
        return requestId;
      },
      redact: {
        paths: redactPaths,
        remove: true,
      },
      serializers: {
        req(req) {
          const { id, method, url } = req;
          // the redirect carries the authorization code; keep it out of access logs
          return { id, method, url: typeof url === 'string' ? url.split('?')[0] : url };
        },
        res(res) {
          const { statusCode } = res;
          return { statusCode };
        },
      },
    }),
  );

  app.use(
    helmet({
      contentSecurityPolicy: appConfig.helmet.contentSecurityPolicy,
      crossOriginEmbedderPolicy: false,
    }),
  );
  app.use(
    rateLimit({
      windowMs: appConfig.rateLimit.windowMs,
      limit: appConfig.rateLimit.max,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (req, res) => {
        const retryAfterSeconds = Math.ceil(appConfig.rateLimit.windowMs / 1000);
        res.setHeader('Retry-After', retryAfterSeconds.toString());
        const requestId = extractRequestId(req);
        res.status(429).json({
          error: {
            code: 'RATE_LIMITED',
            message: 'Too many requests. Slow down before retrying.',
            details: {
              windowMs: appConfig.rateLimit.windowMs,
              maxRequests: appConfig.rateLimit.max,
              retryAfterSeconds,
              requestId,
            },
            requestId,
          },
        });
      },
    }),
  );

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/ready', (req, res) => {
    const requestId = extractRequestId(req);
    const { state, expiresAt } = services.tokenManager.status();
    const details = {
      authState: state,
      expiresAt: expiresAt ? expiresAt.toISOString() : null,
    };

    if (state === TokenStates.unauthenticated) {
      res.status(503).json({
        error: {
          code: 'SERVICE_UNAVAILABLE',
          message: 'No vendor credential is held. Authorize via /oauth.auth.',
          details,
          requestId,
        },
      });
      return;
    }

    res.json({ status: 'ready', details, requestId });
  });

  app.use(createOAuthRouter(services.authorizationFlow, services.tokenManager));
  app.use(createMetricsRouter(services.metricsCollector));

  app.use((req, res) => {
    const requestId = extractRequestId(req);
    res.status(404).json({
      error: {
        code: 'NOT_FOUND',
        message: 'Resource not found',
        requestId,
      },
    });
  });

  app.use(errorHandler);

  return app;
};
