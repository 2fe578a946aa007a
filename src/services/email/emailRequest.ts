/**
 * Email Request
 *
 * Shape of the object route handlers put in the stash for the email views.
 * The views mutate it in place while folding fields into headers.
 *
 * @module services/email/emailRequest
 */

import { z } from 'zod';
import { MimeMessage, type HeaderPair } from './mimeMessage';

// ========================================
// TYPES
// ========================================

export type AddressList = string | string[];

export interface TemplateSpec {
  template: string;
  /** Name of the rendering view; falls back to the configured default. */
  view?: string;
  contentType?: string;
  charset?: string;
}

export interface EmailRequest {
  to?: AddressList;
  cc?: AddressList;
  bcc?: AddressList;
  from?: string;
  subject?: string;
  body?: string | Buffer;
  header?: HeaderPair[];
  parts?: MimeMessage[];
  contentType?: string;
  charset?: string;
  template?: string;
  templates?: Array<string | TemplateSpec>;
}

// ========================================
// VALIDATION
// ========================================

const AddressListSchema = z.union([z.string(), z.array(z.string())]);

export const TemplateSpecSchema = z.object({
  template: z.string().min(1),
  view: z.string().optional(),
  contentType: z.string().optional(),
  charset: z.string().optional(),
});

export const EmailRequestSchema = z
  .object({
    to: AddressListSchema.optional(),
    cc: AddressListSchema.optional(),
    bcc: AddressListSchema.optional(),
    from: z.string().optional(),
    subject: z.string().optional(),
    body: z.union([z.string(), z.instanceof(Buffer)]).optional(),
    header: z.array(z.tuple([z.string(), z.string()])).optional(),
    parts: z.array(z.custom<MimeMessage>((value) => value instanceof MimeMessage)).optional(),
    contentType: z.string().optional(),
    charset: z.string().optional(),
    template: z.string().optional(),
    templates: z.array(z.union([z.string(), TemplateSpecSchema])).optional(),
  })
  .passthrough();

/**
 * Narrow a stash value to an email request without copying it, so the
 * views keep mutating the object the route handler put there.
 */
export function isEmailRequest(value: unknown): value is EmailRequest {
  return EmailRequestSchema.safeParse(value).success;
}

/** Issues that make a stash value unusable as an email request. */
export function describeEmailRequestIssues(value: unknown): string[] {
  const result = EmailRequestSchema.safeParse(value);
  if (result.success) return [];
  return result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
