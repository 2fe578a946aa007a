/**
 * Email View
 *
 * Sends the email a route handler left in the stash. Configuration:
 *
 *   new EmailView({
 *     stashKey: 'email',                 // where to look in the stash
 *     default: {
 *       contentType: 'text/plain',       // used when the request sets none
 *       charset: 'utf-8',                // left off when not configured
 *     },
 *     sender: {
 *       mailer: 'SMTP',                  // SMTP, Sendmail, Stream, Test, or a registered name
 *       mailerArgs: { host: 'smtp.example.com', username: 'user', password: 'secret' },
 *     },
 *   });
 *
 * With SMTP and no host, delivery goes to localhost, where mail often sits
 * in a queue and never arrives.
 *
 * In a route handler:
 *
 *   res.locals.email = {
 *     to: 'someone@example.com',
 *     from: 'no-reply@example.com',
 *     subject: 'Your Subject Here',
 *     body: 'Body Body Body',
 *   };
 *   await forward(ctx, 'Email');
 *
 * Or give the headers directly, and parts instead of a body:
 *
 *   res.locals.email = {
 *     header: [['To', 'foo@example.com'], ['Subject', 'Raw headers']],
 *     parts: [MimeMessage.create({ attributes: { contentType: 'text/plain' }, body: 'Part one' })],
 *   };
 *
 * Failures are thrown as EmailViewError.
 *
 * @module views/emailView
 */

import type { Logger } from 'winston';
import {
  normalizeMailerArgs,
  parseEmailViewConfig,
  type EmailViewConfig,
  type EmailViewConfigInput,
} from '../config/viewConfig';
import type { ProcessingView, RequestContext } from '../framework/context';
import { EmailViewError, describeError } from '../services/email/emailErrors';
import { describeEmailRequestIssues, isEmailRequest, type EmailRequest } from '../services/email/emailRequest';
import { buildHeader } from '../services/email/headerBuilder';
import {
  DEFAULT_MAILER_ORDER,
  defaultTransportRegistry,
  type MailTransport,
  type SendResult,
  type TransportRegistry,
} from '../services/email/emailTransport';
import {
  MimeMessage,
  splitContentType,
  type MimeAttributes,
  type MimeCreateOptions,
} from '../services/email/mimeMessage';
import { viewLogger } from '../utils/logger';

export interface EmailViewOptions {
  transports?: TransportRegistry;
  logger?: Logger;
}

export class EmailView implements ProcessingView {
  readonly config: Readonly<EmailViewConfig>;
  readonly mailer: MailTransport;
  protected readonly log: Logger;

  constructor(config: EmailViewConfigInput = {}, options: EmailViewOptions = {}) {
    this.log = options.logger ?? viewLogger;
    this.config = parseConfigBlock(() => parseEmailViewConfig(config));

    if (this.config.stashKey === '') {
      throw new EmailViewError('STASH_KEY_UNDEFINED', `${this.constructor.name} stashKey isn't defined!`);
    }

    this.mailer = this.createMailer(options.transports ?? defaultTransportRegistry);
  }

  private createMailer(transports: TransportRegistry): MailTransport {
    const { mailer, mailerArgs } = this.config.sender;

    const args = mailerArgs === undefined ? undefined : normalizeMailerArgs(mailerArgs);
    if (mailerArgs !== undefined && args === undefined) {
      throw new EmailViewError('INVALID_MAILER_ARGS', 'Invalid mailerArgs specified, expected an object, [key, value] pairs or a flat key, value list');
    }

    // Availability checks parse the arguments too
    const isAvailable = (candidate: string): boolean => {
      try {
        return transports.isAvailable(candidate, args);
      } catch (error: unknown) {
        throw new EmailViewError('INVALID_MAILER_ARGS', `Invalid mailerArgs for ${candidate}: ${describeError(error)}`);
      }
    };

    let name: string | undefined = mailer;
    if (name) {
      if (!isAvailable(name)) {
        throw new EmailViewError('TRANSPORT_UNAVAILABLE', `${name} is not supported, registered transports: ${transports.names().join(', ')}`);
      }
    } else {
      name = DEFAULT_MAILER_ORDER.find(isAvailable);
      if (!name) {
        throw new EmailViewError('TRANSPORT_UNAVAILABLE', 'No default mail transport is available');
      }
    }

    this.log.debug('Mail transport selected', { transport: name });
    try {
      return transports.create(name, args);
    } catch (error: unknown) {
      throw new EmailViewError('INVALID_MAILER_ARGS', `Invalid mailerArgs for ${name}: ${describeError(error)}`);
    }
  }

  /**
   * Sets up the email from the stash and hands it to the transport.
   */
  async process(ctx: RequestContext): Promise<void> {
    const email = this.readEmail(ctx);
    await this.send(ctx, email);
  }

  protected readEmail(ctx: RequestContext): EmailRequest {
    const value = ctx.stash[this.config.stashKey];
    if (!isEmailRequest(value)) {
      throw new EmailViewError('INVALID_EMAIL', "Can't send email without a valid email structure", {
        stashKey: this.config.stashKey,
        issues: describeEmailRequestIssues(value),
      });
    }
    return value;
  }

  protected async send(ctx: RequestContext, email: EmailRequest): Promise<void> {
    if (this.config.contentType && !email.contentType) {
      email.contentType = this.config.contentType;
    }

    // Read before the header builder consumes them. A charset parameter on
    // the content type counts as the request's charset.
    const requestedType = email.contentType ? splitContentType(email.contentType) : undefined;
    const requested: MimeAttributes = {
      contentType: requestedType?.contentType,
      charset: email.charset || requestedType?.charset,
    };
    delete email.charset;

    const header = buildHeader(email);

    const { parts, body } = email;
    const hasParts = Array.isArray(parts) && parts.length > 0;
    if (!hasParts && (body === undefined || body.length === 0)) {
      throw new EmailViewError('NO_BODY');
    }

    const mime: MimeCreateOptions = hasParts
      ? { header, parts, attributes: requested }
      : { header, body, attributes: requested };

    const message = this.generateMessage(ctx, mime);
    if (!message) {
      throw new EmailViewError('MESSAGE_NOT_CREATED');
    }

    const result: SendResult = await this.mailer.send(message);
    if (!result.success) {
      this.log.warn('Email send failed', { transport: this.mailer.name, error: result.error });
      throw new EmailViewError('SEND_FAILED', result.error, { transport: this.mailer.name });
    }

    this.log.info('Email sent', {
      transport: this.mailer.name,
      messageId: result.messageId,
      parts: message.parts.length,
    });
  }

  /**
   * Merges the given attributes with the configured defaults. Empty values
   * count as absent. The result is what generateMessage puts on the
   * message.
   */
  setupAttributes(ctx: RequestContext, attrs: MimeAttributes = {}): MimeAttributes {
    const defaults = this.config.default;
    const merged: MimeAttributes = { ...attrs };

    if (attrs.contentType) {
      if (ctx.debug) this.log.debug(`Using specified content type ${attrs.contentType}`);
      merged.contentType = attrs.contentType;
    } else if (defaults.contentType) {
      if (ctx.debug) this.log.debug(`Using default content type ${defaults.contentType}`);
      merged.contentType = defaults.contentType;
    } else {
      delete merged.contentType;
    }

    if (attrs.charset) {
      merged.charset = attrs.charset;
    } else if (defaults.charset) {
      merged.charset = defaults.charset;
    } else {
      delete merged.charset;
    }

    return merged;
  }

  /**
   * Builds the message to send. Override to post-process or replace it.
   */
  generateMessage(ctx: RequestContext, mime: MimeCreateOptions): MimeMessage | undefined {
    return MimeMessage.create({ ...mime, attributes: this.setupAttributes(ctx, mime.attributes) });
  }
}

/**
 * Runs a configuration parser, turning validation failures into
 * INVALID_CONFIGURATION errors.
 */
export function parseConfigBlock<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error: unknown) {
    throw new EmailViewError('INVALID_CONFIGURATION', `Invalid email view configuration: ${describeError(error)}`);
  }
}
