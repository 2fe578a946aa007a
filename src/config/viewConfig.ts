/**
 * Email View Configuration
 *
 * Zod schemas for the configuration block of an email view. Parsed once
 * when the view is constructed and frozen afterwards.
 *
 * @module config/viewConfig
 */

import { z } from 'zod';

// ========================================
// SCHEMAS
// ========================================

const MailerArgsObjectSchema = z.record(z.unknown());
const MailerArgsPairsSchema = z.array(z.tuple([z.string(), z.unknown()]));
// [key1, value1, key2, value2, ...]
const MailerArgsFlatSchema = z
  .array(z.unknown())
  .refine((list) => list.length % 2 === 0 && list.every((item, i) => i % 2 === 1 || typeof item === 'string'));

export const EmailViewConfigSchema = z.object({
  /** Where to look in the stash for the email information. */
  stashKey: z.string().default('email'),
  /** Content type applied to a request that brings none. */
  contentType: z.string().optional(),
  default: z
    .object({
      contentType: z.string().default('text/plain'),
      // A text part without charset is read as US-ASCII by mail clients
      charset: z.string().optional(),
    })
    .default({}),
  sender: z
    .object({
      mailer: z.string().optional(),
      // Passed straight to the transport
      mailerArgs: z.unknown().optional(),
    })
    .default({}),
});

export const TemplateViewConfigSchema = EmailViewConfigSchema.extend({
  /** Prefix joined in front of every template path. */
  templatePrefix: z.string().default(''),
  /** Rendering view used when a template entry names none. */
  defaultView: z.string().optional(),
});

export type EmailViewConfigInput = z.input<typeof EmailViewConfigSchema>;
export type EmailViewConfig = z.output<typeof EmailViewConfigSchema>;
export type TemplateViewConfigInput = z.input<typeof TemplateViewConfigSchema>;
export type TemplateViewConfig = z.output<typeof TemplateViewConfigSchema>;
export type MailerArgs = Record<string, unknown>;

// ========================================
// PARSING
// ========================================

export function parseEmailViewConfig(input: EmailViewConfigInput = {}): Readonly<EmailViewConfig> {
  return Object.freeze(EmailViewConfigSchema.parse(input));
}

export function parseTemplateViewConfig(input: TemplateViewConfigInput = {}): Readonly<TemplateViewConfig> {
  return Object.freeze(TemplateViewConfigSchema.parse(input));
}

/**
 * Mailer arguments as a plain object. Accepts an object, a list of
 * [key, value] pairs, or a flat [key, value, key, value] list. Returns
 * undefined for anything else.
 */
export function normalizeMailerArgs(args: unknown): MailerArgs | undefined {
  const object = MailerArgsObjectSchema.safeParse(args);
  if (object.success) return object.data;

  const pairs = MailerArgsPairsSchema.safeParse(args);
  if (pairs.success) return Object.fromEntries(pairs.data);

  const flat = MailerArgsFlatSchema.safeParse(args);
  if (!flat.success) return undefined;

  const entries: Array<[string, unknown]> = [];
  for (let i = 0; i < flat.data.length; i += 2) {
    entries.push([String(flat.data[i]), flat.data[i + 1]]);
  }
  return Object.fromEntries(entries);
}
