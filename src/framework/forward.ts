/**
 * Forwarding to views
 *
 * `forward` runs a view for the current request and records a failure in
 * the request's error list instead of throwing, so the route handler can
 * check `ctx.errors` afterwards:
 *
 *   const sent = await forward(ctx, 'Email');
 *   if (!sent) {
 *     res.status(500).send('Email Failed');
 *   }
 *
 * `emailViewMiddleware` is the Express flavour: failures go to `next(err)`.
 *
 * @module framework/forward
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { describeError } from '../services/email/emailErrors';
import { frameworkLogger } from '../utils/logger';
import { canProcess, contextFromExpress, type ProcessingView, type RequestContext } from './context';
import type { ViewRegistry } from './viewRegistry';

/**
 * Processes the view and resolves to true on success. On failure the error
 * is appended to `ctx.errors` and the promise resolves to false.
 */
export async function forward(ctx: RequestContext, target: string | ProcessingView): Promise<boolean> {
  try {
    const view = typeof target === 'string' ? resolveProcessingView(ctx, target) : target;
    await view.process(ctx);
    return true;
  } catch (error: unknown) {
    const err = error instanceof Error ? error : new Error(describeError(error));
    ctx.log.error('View processing failed', {
      view: typeof target === 'string' ? target : target.constructor.name,
      error: err.message,
    });
    ctx.errors.push(err);
    return false;
  }
}

function resolveProcessingView(ctx: RequestContext, name: string): ProcessingView {
  const view = ctx.view(name);
  if (!canProcess(view)) {
    throw new Error(`View '${name}' is not registered or cannot be forwarded to`);
  }
  return view;
}

/**
 * Express middleware that processes the named view with `res.locals` as
 * the stash. Calls `next()` when the email went out and `next(err)` when it
 * did not.
 */
export function emailViewMiddleware(
  views: ViewRegistry,
  viewName: string,
  options: { debug?: boolean } = {}
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const ctx = contextFromExpress(req, res, views, options);
    const view = ctx.view(viewName);

    if (!canProcess(view)) {
      next(new Error(`View '${viewName}' is not registered or cannot be forwarded to`));
      return;
    }

    try {
      await view.process(ctx);
    } catch (error: unknown) {
      frameworkLogger.error('Email view middleware failed', { view: viewName, error: describeError(error) });
      next(error);
      return;
    }
    next();
  };
}
