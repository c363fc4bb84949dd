/**
 * Request Logging Middleware
 * Tags each request with an id and logs its start and completion
 */

import { randomUUID } from 'crypto';
import { Request, Response, NextFunction } from 'express';

export const REQUEST_ID_HEADER = 'X-Request-ID';

export function requestLoggingMiddleware(req: Request, res: Response, next: NextFunction): void {
  const requestId = randomUUID();
  const startTime = process.hrtime.bigint();

  res.locals.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);

  console.log(
    `Request started: ${req.method} ${req.path} | Request ID: ${requestId} | Client: ${req.ip || 'unknown'}`
  );

  const elapsed = (): string => {
    const durationMs = Number(process.hrtime.bigint() - startTime) / 1e6;
    return `${(durationMs / 1000).toFixed(3)}s`;
  };

  res.on('finish', () => {
    console.log(
      `Request completed: ${req.method} ${req.path} | Status: ${res.statusCode} | ` +
        `Duration: ${elapsed()} | Request ID: ${requestId}`
    );
  });

  // 'close' also follows a normal 'finish'; only unfinished responses failed
  res.on('close', () => {
    if (res.writableFinished) {
      return;
    }
    console.warn(
      `Request failed: ${req.method} ${req.path} | Reason: connection closed before response | ` +
        `Duration: ${elapsed()} | Request ID: ${requestId}`
    );
  });

  next();
}
