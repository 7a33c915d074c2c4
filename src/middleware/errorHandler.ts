// Renders every failure as { detail, code }; internals never reach the caller
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { HttpError, NotFoundError, ValidationError } from '../errors';
import type { Logger } from '../logger';

interface ErrorBody {
  detail: string;
  code: string;
  issues?: unknown;
}

function buildErrorBody(err: HttpError): ErrorBody {
  return {
    detail: err.detail,
    code: err.code,
    ...(err instanceof ValidationError ? { issues: err.issues } : {}),
  };
}

// body-parser errors carry an HTTP status and a `type` such as entity.parse.failed
function isBodyParserError(err: unknown): err is Error & { status: number; type: string } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    'type' in err &&
    typeof err.type === 'string'
  );
}

export const notFoundHandler: RequestHandler = (_req, _res, next) => {
  next(new NotFoundError());
};

export function errorHandler(logger: Logger) {
  // Express only treats a handler as error middleware when it declares four parameters
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof HttpError) {
      res.set(err.headers).status(err.status).json(buildErrorBody(err));
      return;
    }

    if (isBodyParserError(err) && err.status >= 400 && err.status < 500) {
      logger.warn({ path: req.path, type: err.type, status: err.status }, 'Rejected request body');
      const detail = err.type === 'entity.parse.failed' ? 'Malformed request body' : err.message;
      res.status(err.status).json({ detail, code: 'bad_request' } satisfies ErrorBody);
      return;
    }

    logger.error({ err, path: req.path, method: req.method }, 'Unhandled error');
    res.status(500).json({ detail: 'Internal server error', code: 'internal_error' } satisfies ErrorBody);
  };
}
