/**
 * Error Handler
 * API error types and the Express handlers that render them
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';

export interface ErrorResponseBody {
  error: {
    code: string;
    message: string;
    request_id: string | null;
    [detail: string]: unknown;
  };
}

export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly code: string = 'API_ERROR',
    public readonly details: Record<string, unknown> = {},
    public readonly headers: Record<string, string> = {}
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class RateLimitExceededError extends ApiError {
  constructor(message: string, retryAfterSeconds: number) {
    super(
      429,
      message,
      'RATE_LIMIT_EXCEEDED',
      { retry_after: retryAfterSeconds },
      { 'Retry-After': String(Math.ceil(retryAfterSeconds)) }
    );
  }
}

export function getRequestId(res: Response): string | null {
  const requestId: unknown = res.locals.requestId;
  return typeof requestId === 'string' ? requestId : null;
}

export function errorBody(
  code: string,
  message: string,
  requestId: string | null,
  details: Record<string, unknown> = {}
): ErrorResponseBody {
  return { error: { code, message, ...details, request_id: requestId } };
}

/**
 * Wrap an async route handler so rejections reach the error handler
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  res
    .status(404)
    .json(errorBody('ROUTE_NOT_FOUND', `Route not found: ${req.method} ${req.path}`, getRequestId(res)));
}

/**
 * Global error handler (must be registered last)
 */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const requestId = getRequestId(res);

  if (err instanceof ApiError) {
    // Client errors (4xx) are answered without logging
    if (err.statusCode >= 500) {
      console.error(`Application error: ${err.message} | Path: ${req.path} | Request ID: ${requestId}`);
    }
    for (const [name, value] of Object.entries(err.headers)) {
      res.setHeader(name, value);
    }
    res.status(err.statusCode).json(errorBody(err.code, err.message, requestId, err.details));
    return;
  }

  // express.json() raises a SyntaxError carrying status 400 for malformed bodies
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    res.status(400).json(errorBody('INVALID_JSON', 'Request body is not valid JSON', requestId));
    return;
  }

  const message = err instanceof Error ? err.message : String(err);
  console.error(`Internal server error: ${message} | Path: ${req.path} | Request ID: ${requestId}`);
  res
    .status(500)
    .json(errorBody('INTERNAL_SERVER_ERROR', 'An unexpected error occurred. Please try again later.', requestId));
}
