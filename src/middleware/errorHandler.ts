import { Request, Response, NextFunction } from 'express';

/**
 * Error with an HTTP status, raised by routes
 */
export class HttpError extends Error {
  constructor(
    public status: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/**
 * Status carried by the error: HttpError, or a body-parser error
 * (malformed JSON, oversized body) which sets `status` itself.
 */
function statusOf(err: Error): number {
  if (err instanceof HttpError) {
    return err.status;
  }
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 600) {
    return err.status;
  }
  return 500;
}

/**
 * Centralized error handler middleware.
 * Should be registered last after all routes.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status = statusOf(err);

  if (status >= 500) {
    console.error(`[Error] ${req.method} ${req.path}:`, err);
  } else {
    console.warn(`[Error] ${req.method} ${req.path}: ${status} ${err.message}`);
  }

  // Internal details stay in the log
  res.status(status).json({
    error: status >= 500 ? 'Internal Server Error' : 'Error',
    message: status >= 500 ? 'An unexpected error occurred' : err.message,
  });
}
