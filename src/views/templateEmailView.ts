/**
 * Template Email View
 *
 * Renders each template named in the email request through a rendering
 * view, wraps every output in a MIME part and lets EmailView send the
 * result. Which engine renders does not matter as long as the view has a
 * render method.
 *
 *   new TemplateEmailView({
 *     contentType: 'multipart/alternative', // top-level message, not the parts
 *     templatePrefix: 'email',              // looked up below the views directory
 *     defaultView: 'TT',
 *     sender: { mailer: 'SMTP' },
 *   });
 *
 *   res.locals.email = {
 *     to: 'someone@example.com',
 *     from: 'no-reply@example.com',
 *     subject: 'I am a generated email',
 *     templates: ['text_plain/test.tt', 'text_html/test.tt'],
 *   };
 *
 * Without an explicit contentType, a part's content type is guessed from
 * the directory the template sits in: text_plain/ is text/plain, text_html/
 * is text/html.
 *
 * @module views/templateEmailView
 */

import {
  parseTemplateViewConfig,
  type TemplateViewConfig,
  type TemplateViewConfigInput,
} from '../config/viewConfig';
import { canRender, type RenderingView, type RequestContext } from '../framework/context';
import { EmailViewError, describeError } from '../services/email/emailErrors';
import type { EmailRequest, TemplateSpec } from '../services/email/emailRequest';
import { MimeMessage, splitContentType } from '../services/email/mimeMessage';
import { templateLogger } from '../utils/logger';
import { EmailView, parseConfigBlock, type EmailViewOptions } from './emailView';

/** First path segment that names a content type, e.g. text_html. */
const CONTENT_TYPE_DIR = /^([a-z]+)_([a-z0-9.+-]+)$/i;

export interface ResolvedTemplate {
  /** Path handed to the rendering view, prefix included. */
  path: string;
  view: RenderingView;
  contentType: string;
  charset?: string;
}

export class TemplateEmailView extends EmailView {
  readonly templateConfig: Readonly<TemplateViewConfig>;

  constructor(config: TemplateViewConfigInput = {}, options: EmailViewOptions = {}) {
    super(config, { ...options, logger: options.logger ?? templateLogger });
    this.templateConfig = parseConfigBlock(() => parseTemplateViewConfig(config));
  }

  async process(ctx: RequestContext): Promise<void> {
    const email = this.readEmail(ctx);

    const specs = this.templateSpecs(email);
    if (specs.length === 0) {
      throw new EmailViewError('NO_TEMPLATE');
    }

    const parts: MimeMessage[] = [];
    for (const spec of specs) {
      const resolved = this.resolveTemplate(ctx, spec);
      parts.push(await this.renderPart(ctx, resolved));
    }

    delete email.body;
    email.parts = [...(email.parts ?? []), ...parts];

    // EmailView does the sending, this view only assembles the parts
    await this.send(ctx, email);
  }

  /**
   * Template entries of the request; `templates` wins over `template`.
   */
  templateSpecs(email: EmailRequest): TemplateSpec[] {
    if (email.templates && email.templates.length > 0) {
      return email.templates.map((entry) => (typeof entry === 'string' ? { template: entry } : entry));
    }
    if (email.template) {
      return [{ template: email.template }];
    }
    return [];
  }

  /**
   * Path, rendering view, content type and charset for one entry.
   */
  resolveTemplate(ctx: RequestContext, spec: TemplateSpec): ResolvedTemplate {
    const path = this.templatePath(spec.template);
    const view = this.renderingView(ctx, spec.view);

    const given = spec.contentType ? splitContentType(spec.contentType) : undefined;
    const contentType = given?.contentType
      || guessContentType(spec.template)
      || this.config.default.contentType;
    const charset = spec.charset || given?.charset || this.config.default.charset;

    return { path, view, contentType, charset };
  }

  /**
   * Template path below the configured prefix, without leading slashes.
   */
  templatePath(template: string): string {
    const prefix = this.templateConfig.templatePrefix.replace(/\/+$/, '');
    const relative = template.replace(/^\/+/, '');
    const joined = prefix ? `${prefix}/${relative}` : relative;
    return joined.replace(/^\/+/, '');
  }

  private renderingView(ctx: RequestContext, name?: string): RenderingView {
    const viewName = name ?? this.templateConfig.defaultView;
    const view = ctx.view(viewName);

    if (!view) {
      throw new EmailViewError('VIEW_NOT_FOUND', `Rendering view '${viewName ?? '(default)'}' is not registered`);
    }
    if (!canRender(view)) {
      throw new EmailViewError('VIEW_NOT_RENDERABLE', `Rendering view '${viewName ?? '(default)'}' does not have a render method`);
    }
    return view;
  }

  private async renderPart(ctx: RequestContext, resolved: ResolvedTemplate): Promise<MimeMessage> {
    const extraStash = {
      contentType: resolved.contentType,
      stashKey: this.config.stashKey,
      ...ctx.stash,
    };

    let output: string | Error;
    try {
      output = await resolved.view.render(ctx, resolved.path, extraStash);
    } catch (error: unknown) {
      output = error instanceof Error ? error : new Error(describeError(error));
    }

    if (output instanceof Error) {
      this.log.error('Template rendering failed', { template: resolved.path, error: output.message });
      throw new EmailViewError('RENDER_FAILED', output.message, { template: resolved.path });
    }

    this.log.debug('Rendered email template', { template: resolved.path, contentType: resolved.contentType });

    return MimeMessage.create({
      attributes: { contentType: resolved.contentType, charset: resolved.charset },
      body: output,
    });
  }
}

/**
 * Content type named by the template's first directory: text_plain/a.tt
 * is text/plain. Undefined when the template sits in no such directory.
 */
export function guessContentType(template: string): string | undefined {
  const segments = template.replace(/^\/+/, '').split('/');
  if (segments.length < 2) return undefined;

  const match = CONTENT_TYPE_DIR.exec(segments[0]);
  if (!match) return undefined;
  return `${match[1]}/${match[2]}`.toLowerCase();
}
