import type { NextFunction, Request, Response } from 'express';
import { apiError } from '../models/shared.js';

function isMalformedJson(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/** Status of a client error that is safe to show, as set by body-parser and http-errors. */
function exposedStatus(err: unknown): number | undefined {
  if (
    err instanceof Error &&
    'expose' in err &&
    err.expose === true &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  ) {
    return err.status;
  }
  return undefined;
}

// Express recognises error middleware by its four parameters
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (isMalformedJson(err)) {
    res.status(400).json(apiError('Malformed JSON body'));
    return;
  }
  const status = exposedStatus(err);
  if (status !== undefined && err instanceof Error) {
    res.status(status).json(apiError(err.message));
    return;
  }
  const message = err instanceof Error ? err.stack ?? err.message : String(err);
  console.error(`Unhandled error on ${req.method} ${req.originalUrl}: ${message}`);
  res.status(500).json(apiError('Internal server error'));
}
