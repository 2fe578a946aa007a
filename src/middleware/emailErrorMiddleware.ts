/**
 * Email Error Middleware
 *
 * Turns EmailViewError into a JSON error response. Anything else is passed
 * on to the next error handler. Never returns HTML.
 *
 * @module middleware/emailErrorMiddleware
 */

import type { NextFunction, Request, Response } from 'express';
import { isEmailViewError } from '../services/email/emailErrors';
import { frameworkLogger } from '../utils/logger';

export interface EmailErrorBody {
  ok: false;
  error: {
    code: string;
    message: string;
  };
}

export function emailErrorMiddleware(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (!isEmailViewError(err)) {
    next(err);
    return;
  }

  if (res.headersSent) {
    next(err);
    return;
  }

  frameworkLogger.warn('Email request failed', {
    method: req.method,
    path: req.path,
    code: err.code,
    error: err.message,
  });

  const body: EmailErrorBody = {
    ok: false,
    error: { code: err.code, message: err.message },
  };
  res.status(err.status).json(body);
}
