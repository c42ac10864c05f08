import type { NextFunction, Request, Response } from 'express';

import { errorMessage, logError } from '../utils/logger.js';

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  // body-parser marks malformed JSON as a SyntaxError carrying the raw body.
  if (err instanceof SyntaxError && 'body' in err) {
    return res.status(400).json({ ok: false, error: 'invalid json' });
  }

  const msg = errorMessage(err);
  logError('unhandled error', {
    method: req.method,
    url: req.originalUrl || req.url,
    message: msg,
  });
  return res.status(500).json({ ok: false, error: msg });
}
