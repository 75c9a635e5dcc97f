import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  DomainError,
  EmptyUpdateError,
  InvalidDescriptionError,
  InvalidTitleError,
} from '../../../domain/todos/errors.js';
import { ConflictError, NotFoundError, UnauthorizedError } from '../../../application/errors.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

function send(res: Response, status: number, body: ErrorResponse): void {
  res.status(status).json(body);
}

function domainErrorCode(err: DomainError): string {
  if (err instanceof InvalidTitleError) return 'INVALID_TITLE';
  if (err instanceof InvalidDescriptionError) return 'INVALID_DESCRIPTION';
  if (err instanceof EmptyUpdateError) return 'EMPTY_UPDATE';
  return 'DOMAIN_ERROR';
}

/**
 * Status carried by errors raised inside Express itself (body-parser),
 * e.g. a malformed JSON body or an oversized payload.
 */
function httpStatusOf(err: Error): number | undefined {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return undefined;
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    send(res, 400, {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    });
    return;
  }

  if (err instanceof DomainError) {
    send(res, 400, { code: domainErrorCode(err), message: err.message });
    return;
  }

  if (err instanceof UnauthorizedError) {
    send(res, 401, { code: 'UNAUTHORIZED', message: err.message });
    return;
  }

  // Also covers records owned by another user
  if (err instanceof NotFoundError) {
    send(res, 404, { code: 'NOT_FOUND', message: err.message });
    return;
  }

  if (err instanceof ConflictError) {
    send(res, 409, { code: 'CONFLICT', message: err.message });
    return;
  }

  const status = httpStatusOf(err);
  if (status !== undefined) {
    const invalidJson = 'type' in err && err.type === 'entity.parse.failed';
    send(res, status, {
      code: invalidJson ? 'INVALID_JSON' : 'BAD_REQUEST',
      message: invalidJson ? 'Request body is not valid JSON' : err.message,
    });
    return;
  }

  console.error('Unhandled error:', err);
  send(res, 500, { code: 'INTERNAL_ERROR', message: 'Internal server error' });
}
