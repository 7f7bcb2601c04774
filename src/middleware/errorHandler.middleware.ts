import type { ErrorRequestHandler, Request } from 'express';
import { ZodError } from 'zod';

import { HttpError, TokenErrorKinds, TokenError, badRequestError } from '../utils/errors';
import { logger } from '../utils/logger';

// Seconds a client should wait before retrying after a transient vendor failure.
const TRANSIENT_RETRY_AFTER_SECONDS = 30;

type ErrorBody = {
  code: string;
  message: string;
  kind?: string;
  details?: unknown;
  requestId?: string;
};

const requestIdOf = (req: Request): string | undefined =>
  typeof req.id === 'string' ? req.id : undefined;

const toErrorBody = (error: HttpError, requestId: string | undefined): ErrorBody => ({
  code: error.code,
  message: error.message,
  kind: error instanceof TokenError ? error.kind : undefined,
  details: error.details,
  requestId,
});

export const errorHandler: ErrorRequestHandler = (error, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  const requestId = requestIdOf(req);
  const httpError =
    error instanceof ZodError
      ? badRequestError('Request validation failed', error.flatten())
      : error;

  if (!(httpError instanceof HttpError)) {
    logger.error({ err: error, requestId }, 'unhandled error');
    res.status(500).json({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'Something went wrong. Try again later.',
        requestId,
      },
    });
    return;
  }

  if (httpError instanceof TokenError) {
    logger.warn(
      { kind: httpError.kind, code: httpError.code, requestId },
      httpError.message,
    );
    if (httpError.kind === TokenErrorKinds.transientNetwork) {
      res.setHeader('Retry-After', TRANSIENT_RETRY_AFTER_SECONDS.toString());
    }
  }

  res.status(httpError.status).json({ error: toErrorBody(httpError, requestId) });
};
