/**
 * Email Transport Layer
 *
 * Pluggable delivery for assembled messages. Transports are looked up by
 * name in a registry:
 * - SMTP      nodemailer SMTP transport
 * - Sendmail  nodemailer sendmail transport (needs the sendmail binary)
 * - Stream    nodemailer stream transport, builds the message and delivers nothing
 * - Test      in-process capture, nothing leaves the process
 *
 * Applications can register their own transports under any other name.
 *
 * @module services/email/emailTransport
 */

import fs from 'fs';
import nodemailer, { type Transporter } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import type SendmailTransport from 'nodemailer/lib/sendmail-transport';
import type StreamTransport from 'nodemailer/lib/stream-transport';
import { z } from 'zod';
import { transportLogger } from '../../utils/logger';
import type { MailerArgs } from '../../config/viewConfig';
import { describeError } from './emailErrors';
import type { MessageEnvelope, MimeMessage } from './mimeMessage';

// ========================================
// TYPES
// ========================================

export type SendResult =
  | { success: true; messageId?: string; envelope?: MessageEnvelope }
  | { success: false; error: string };

export interface MailTransport {
  readonly name: string;
  send(message: MimeMessage): Promise<SendResult>;
}

export interface TransportFactory {
  /** Whether the transport can be used with these arguments on this host. */
  available(args?: MailerArgs): boolean;
  create(args?: MailerArgs): MailTransport;
}

/** Tried in order when a view names no mailer. */
export const DEFAULT_MAILER_ORDER = ['SMTP', 'Sendmail'] as const;

const DEFAULT_SENDMAIL_PATH = '/usr/sbin/sendmail';

// ========================================
// NODEMAILER ADAPTER
// ========================================

/**
 * Sends the already encoded message through a nodemailer transporter. The
 * envelope comes from the message's own address headers.
 */
export class NodemailerTransport<T extends { messageId: string }> implements MailTransport {
  constructor(
    readonly name: string,
    private readonly transporter: Transporter<T>
  ) {}

  async send(message: MimeMessage): Promise<SendResult> {
    try {
      const envelope = message.getEnvelope();
      if (envelope.to.length === 0) {
        return { success: false, error: 'No recipients defined' };
      }

      const raw = await message.build();
      const info = await this.transporter.sendMail({ envelope, raw });

      transportLogger.debug('Message handed to transport', {
        transport: this.name,
        messageId: info.messageId,
        recipients: envelope.to.length,
      });

      return { success: true, messageId: info.messageId, envelope };
    } catch (error: unknown) {
      const reason = describeError(error);
      transportLogger.warn('Transport send failed', { transport: this.name, error: reason });
      return { success: false, error: reason };
    }
  }
}

// ========================================
// TEST TRANSPORT
// ========================================

export interface Delivery {
  message: MimeMessage;
  envelope: MessageEnvelope;
  deliveredAt: Date;
}

const TestArgsSchema = z.object({
  /** Makes every send fail with this reason. */
  failWith: z.string().optional(),
});

/**
 * Keeps every message in memory instead of delivering it.
 */
export class TestTransport implements MailTransport {
  readonly name = 'Test';
  readonly deliveries: Delivery[] = [];
  private readonly failWith?: string;

  constructor(args: MailerArgs = {}) {
    this.failWith = TestArgsSchema.parse(args).failWith;
  }

  async send(message: MimeMessage): Promise<SendResult> {
    if (this.failWith) {
      return { success: false, error: this.failWith };
    }

    const envelope = message.getEnvelope();
    this.deliveries.push({ message, envelope, deliveredAt: new Date() });
    return { success: true, messageId: `test-${this.deliveries.length}`, envelope };
  }

  lastDelivery(): Delivery | undefined {
    return this.deliveries[this.deliveries.length - 1];
  }

  clear(): void {
    this.deliveries.length = 0;
  }
}

// ========================================
// ARGUMENT PARSING
// ========================================

/**
 * Lower-cases argument names, so `Host` and `host` mean the same thing.
 */
function lowerKeys(args: MailerArgs = {}): MailerArgs {
  return Object.fromEntries(Object.entries(args).map(([key, value]) => [key.toLowerCase(), value]));
}

const SmtpArgsSchema = z.object({
  host: z.string().default('localhost'),
  port: z.coerce.number().int().positive().optional(),
  secure: z.boolean().optional(),
  ignoretls: z.boolean().optional(),
  requiretls: z.boolean().optional(),
  name: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  auth: z.object({ user: z.string(), pass: z.string() }).optional(),
  connectiontimeout: z.number().int().positive().optional(),
});

export function smtpOptions(args?: MailerArgs): SMTPTransport.Options {
  const parsed = SmtpArgsSchema.parse(lowerKeys(args));
  const auth = parsed.auth
    ?? (parsed.username ? { user: parsed.username, pass: parsed.password ?? '' } : undefined);

  return {
    host: parsed.host,
    port: parsed.port,
    secure: parsed.secure,
    ignoreTLS: parsed.ignoretls,
    requireTLS: parsed.requiretls,
    name: parsed.name,
    auth,
    connectionTimeout: parsed.connectiontimeout,
  };
}

const SendmailArgsSchema = z.object({
  path: z.string().default(DEFAULT_SENDMAIL_PATH),
  newline: z.enum(['unix', 'windows']).default('unix'),
  args: z.array(z.string()).optional(),
});

export function sendmailOptions(args?: MailerArgs): SendmailTransport.Options {
  const parsed = SendmailArgsSchema.parse(lowerKeys(args));
  return { sendmail: true, path: parsed.path, newline: parsed.newline, args: parsed.args };
}

const StreamArgsSchema = z.object({
  newline: z.enum(['unix', 'windows']).default('unix'),
});

export function streamOptions(args?: MailerArgs): StreamTransport.Options {
  const parsed = StreamArgsSchema.parse(lowerKeys(args));
  return { streamTransport: true, buffer: true, newline: parsed.newline };
}

// ========================================
// REGISTRY
// ========================================

export class TransportRegistry {
  private readonly factories = new Map<string, { name: string; factory: TransportFactory }>();

  register(name: string, factory: TransportFactory): this {
    this.factories.set(name.toLowerCase(), { name, factory });
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name.toLowerCase());
  }

  names(): string[] {
    return [...this.factories.values()].map((entry) => entry.name);
  }

  isAvailable(name: string, args?: MailerArgs): boolean {
    const entry = this.factories.get(name.toLowerCase());
    if (!entry) return false;
    return entry.factory.available(args);
  }

  /** Throws when the name is unknown; check isAvailable first. */
  create(name: string, args?: MailerArgs): MailTransport {
    const entry = this.factories.get(name.toLowerCase());
    if (!entry) {
      throw new Error(`Unknown mail transport '${name}'`);
    }
    transportLogger.debug('Creating mail transport', { transport: entry.name });
    return entry.factory.create(args);
  }
}

/**
 * Registry holding the built-in transports.
 */
export function createDefaultTransportRegistry(): TransportRegistry {
  return new TransportRegistry()
    .register('SMTP', {
      available: () => true,
      create: (args) => new NodemailerTransport('SMTP', nodemailer.createTransport(smtpOptions(args))),
    })
    .register('Sendmail', {
      available: (args) => fs.existsSync(sendmailOptions(args).path ?? DEFAULT_SENDMAIL_PATH),
      create: (args) => new NodemailerTransport('Sendmail', nodemailer.createTransport(sendmailOptions(args))),
    })
    .register('Stream', {
      available: () => true,
      create: (args) => new NodemailerTransport('Stream', nodemailer.createTransport(streamOptions(args))),
    })
    .register('Test', {
      available: () => true,
      create: (args) => new TestTransport(args),
    });
}

export const defaultTransportRegistry = createDefaultTransportRegistry();
