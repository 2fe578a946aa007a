/**
 * Express Render View
 *
 * Rendering view backed by `app.render`, so templates go through whatever
 * engine the application registered for their extension.
 *
 * @module framework/expressRenderView
 */

import type { Application } from 'express';
import type { RenderingView, RequestContext, Stash } from './context';

export class ExpressRenderView implements RenderingView {
  constructor(private readonly app: Application) {}

  /**
   * Resolves to the rendered text, or to the engine's error. Never rejects.
   */
  render(ctx: RequestContext, template: string, extraStash: Stash = {}): Promise<string | Error> {
    return new Promise((resolve) => {
      this.app.render(template, { ...extraStash }, (err: Error | null, rendered: string) => {
        if (err) {
          ctx.log.warn('Template render error', { template, error: err.message });
          resolve(err);
          return;
        }
        resolve(rendered);
      });
    });
  }
}
