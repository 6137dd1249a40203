import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  AuthenticationError,
  DuplicateIdentityError,
  NotFoundError,
  UnauthorizedError,
} from '../../../application/errors.js';
import { errorPage } from '../views/pages.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

interface MappedError {
  status: number;
  body: ErrorResponse;
}

/** Errors raised by Express itself (body-parser, static) carry an HTTP status. */
function clientStatusOf(err: Error): number | undefined {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return undefined;
}

export function toErrorResponse(err: Error): MappedError {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: err.errors.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          })),
        },
      },
    };
  }

  if (err instanceof DuplicateIdentityError) {
    return { status: 400, body: { code: 'DUPLICATE_IDENTITY', message: err.message } };
  }

  if (err instanceof AuthenticationError) {
    return { status: 401, body: { code: 'INVALID_CREDENTIALS', message: err.message } };
  }

  if (err instanceof UnauthorizedError) {
    return { status: 401, body: { code: 'UNAUTHORIZED', message: err.message } };
  }

  if (err instanceof NotFoundError) {
    return { status: 404, body: { code: 'NOT_FOUND', message: err.message } };
  }

  const clientStatus = clientStatusOf(err);
  if (clientStatus !== undefined) {
    return { status: clientStatus, body: { code: 'BAD_REQUEST', message: err.message } };
  }

  return {
    status: 500,
    body: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
  };
}

/**
 * Final Express error handler. Responds with an ErrorResponse as JSON, or an
 * HTML error page when the client asks for HTML (form posts from a browser).
 */
export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const { status, body } = toErrorResponse(err);

  if (status >= 500) {
    console.error('Error:', err);
  } else {
    console.warn(`${status} ${body.code}: ${body.message}`);
  }

  res.status(status).format({
    json: () => {
      res.json(body);
    },
    html: () => {
      res.send(errorPage(status, body.message));
    },
    default: () => {
      res.json(body);
    },
  });
}
