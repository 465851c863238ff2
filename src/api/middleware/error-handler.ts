import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { AppError } from '../../errors.js';
import { logger } from '../../utils/logger.js';

/** Forwards async rejections to the error middleware (express 4 does not) */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

function hasStatus(err: unknown): err is { status: number; type?: string; message: string } {
  return (
    typeof err === 'object' && err !== null &&
    'status' in err && typeof err.status === 'number' &&
    'message' in err && typeof err.message === 'string'
  );
}

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    success: false,
    error: { code: 'NOT_FOUND', message: `Route ${req.method} ${req.path} not found` },
    timestamp: new Date().toISOString(),
  });
};

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // express recognises error middleware by its four parameters
  _next: NextFunction,
) => {
  let status = 500;
  let code = 'INTERNAL_ERROR';
  let message = 'An error occurred';

  if (err instanceof AppError) {
    status = err.statusCode;
    code = err.code;
    message = err.message;
  } else if (hasStatus(err) && err.status >= 400 && err.status < 500) {
    // body-parser errors (malformed JSON, payload too large)
    status = err.status;
    code = err.type === 'entity.too.large' ? 'PAYLOAD_TOO_LARGE' : 'BAD_REQUEST';
    message = err.message;
  }

  if (status >= 500) {
    logger.error(`[api] ${req.method} ${req.path} failed`, { error: err instanceof Error ? err.stack : String(err) });
  } else {
    logger.warn(`[api] ${req.method} ${req.path} -> ${status} ${code}: ${message}`);
  }

  res.status(status).json({
    success: false,
    error: { code, message },
    timestamp: new Date().toISOString(),
  });
};
