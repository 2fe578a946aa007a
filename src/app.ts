/**
 * Example application
 *
 * Wires the email views into an Express app:
 * - GET  /email           plain email from res.locals.email
 * - GET  /template_email  multipart/alternative email rendered from templates
 * - POST /send            email request taken from the JSON body, sent by middleware
 *
 * @module app
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { TemplateViewConfigInput } from './config/viewConfig';
import { contextFromExpress } from './framework/context';
import { ExpressRenderView } from './framework/expressRenderView';
import { emailViewMiddleware, forward } from './framework/forward';
import { ViewRegistry } from './framework/viewRegistry';
import { emailErrorMiddleware } from './middleware/emailErrorMiddleware';
import type { TransportRegistry } from './services/email/emailTransport';
import { placeholderEngine } from './templates/placeholderEngine';
import { EmailView } from './views/emailView';
import { TemplateEmailView } from './views/templateEmailView';

export interface AppOptions {
  /** Directory the template engine reads from. */
  viewsDir: string;
  viewConfig?: TemplateViewConfigInput;
  transports?: TransportRegistry;
  debug?: boolean;
}

export interface EmailApp {
  app: Express;
  views: ViewRegistry;
}

function timeParam(req: Request): string {
  return typeof req.query.time === 'string' ? req.query.time : String(Date.now());
}

export function createApp(options: AppOptions): EmailApp {
  const app = express();
  app.engine('tt', placeholderEngine());
  app.set('views', options.viewsDir);

  const viewConfig = options.viewConfig ?? {};
  const views = new ViewRegistry()
    .register('TT', new ExpressRenderView(app), { default: true })
    .register('Email', new EmailView(viewConfig, { transports: options.transports }))
    .register(
      'EmailTemplate',
      new TemplateEmailView({ templatePrefix: 'email', ...viewConfig }, { transports: options.transports })
    );

  const contextOptions = { debug: options.debug ?? false };

  app.get('/email', async (req: Request, res: Response) => {
    res.locals.email = {
      to: 'test-email@example.com',
      from: 'no-reply@example.com',
      subject: 'Email Test',
      body: `Email Sent at: ${timeParam(req)}`,
    };

    const ctx = contextFromExpress(req, res, views, contextOptions);
    await forward(ctx, 'Email');

    if (ctx.errors.length > 0) {
      res.status(500).send('Email Failed');
      return;
    }
    res.send('Plain Email Ok');
  });

  app.get('/template_email', async (req: Request, res: Response) => {
    res.locals.time = timeParam(req);
    res.locals.email = {
      to: 'test-email@example.com',
      from: 'no-reply@example.com',
      subject: 'Just a test',
      contentType: 'multipart/alternative',
      templates: ['text_plain/test.tt', 'text_html/test.tt'],
    };

    const ctx = contextFromExpress(req, res, views, contextOptions);
    await forward(ctx, 'EmailTemplate');

    if (ctx.errors.length > 0) {
      res.status(500).send('Template Email Failed');
      return;
    }
    res.send('Template Email Ok');
  });

  app.post(
    '/send',
    express.json(),
    (req: Request, res: Response, next: NextFunction) => {
      const body: unknown = req.body;
      res.locals.email = body;
      next();
    },
    emailViewMiddleware(views, 'Email', contextOptions),
    (_req: Request, res: Response) => {
      res.json({ ok: true });
    }
  );

  app.use(emailErrorMiddleware);

  return { app, views };
}
