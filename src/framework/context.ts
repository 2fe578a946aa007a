/**
 * Request Context
 *
 * What a view sees of the current request: the stash, view lookup by name,
 * the per-request error list, a logger and the debug flag.
 *
 * @module framework/context
 */

import type { Request, Response } from 'express';
import type { Logger } from 'winston';
import { frameworkLogger } from '../utils/logger';
import type { ViewRegistry } from './viewRegistry';

// ========================================
// TYPES
// ========================================

export type Stash = Record<string, unknown>;

export interface RequestContext {
  readonly stash: Stash;
  /** Registered view by name; the default view when no name is given. */
  view(name?: string): View | undefined;
  /** Errors raised while processing this request, oldest first. */
  readonly errors: Error[];
  readonly log: Logger;
  readonly debug: boolean;
}

/** A view that can be forwarded to. */
export interface ProcessingView {
  process(ctx: RequestContext): Promise<void>;
}

/** A view that turns a template plus data into text. */
export interface RenderingView {
  render(ctx: RequestContext, template: string, extraStash?: Stash): Promise<string | Error>;
}

export type View = Partial<ProcessingView> & Partial<RenderingView>;

export interface ContextOptions {
  stash?: Stash;
  views?: ViewRegistry;
  log?: Logger;
  debug?: boolean;
}

// ========================================
// FACTORIES
// ========================================

export function createRequestContext(options: ContextOptions = {}): RequestContext {
  const views = options.views;
  return {
    stash: options.stash ?? {},
    view: (name?: string) => views?.get(name),
    errors: [],
    log: options.log ?? frameworkLogger,
    debug: options.debug ?? false,
  };
}

const expressContexts = new WeakMap<Response, RequestContext>();

/**
 * Context bound to an Express request. The stash is `res.locals`, so
 * whatever a route handler puts there is visible to the views. One context
 * is kept per response, so the error list survives several forwards.
 */
export function contextFromExpress(
  req: Request,
  res: Response,
  views: ViewRegistry,
  options: Omit<ContextOptions, 'stash' | 'views'> = {}
): RequestContext {
  const existing = expressContexts.get(res);
  if (existing) return existing;

  const ctx = createRequestContext({
    ...options,
    stash: res.locals,
    views,
    log: options.log ?? frameworkLogger.child({ method: req.method, path: req.path }),
  });
  expressContexts.set(res, ctx);
  return ctx;
}

export function canRender(view: View | undefined): view is View & RenderingView {
  return typeof view?.render === 'function';
}

export function canProcess(view: View | undefined): view is View & ProcessingView {
  return typeof view?.process === 'function';
}
