/**
 * Header Builder
 *
 * Folds the address, subject and content-type fields of an email request
 * into its ordered header list. Each folded field is deleted from the
 * request.
 *
 * @module services/email/headerBuilder
 */

import * as mimeFuncs from 'nodemailer/lib/mime-funcs';
import type { HeaderPair } from './mimeMessage';
import type { AddressList, EmailRequest } from './emailRequest';

type HeaderField = 'to' | 'cc' | 'bcc' | 'from' | 'subject' | 'contentType';

/** Fixed order in which request fields become headers. */
export const HEADER_ORDER: ReadonlyArray<readonly [HeaderField, string]> = [
  ['to', 'To'],
  ['cc', 'Cc'],
  ['bcc', 'Bcc'],
  ['from', 'From'],
  ['subject', 'Subject'],
  ['contentType', 'Content-type'],
];

/** Max length of an encoded-word, as RFC 2047 recommends keeping lines short. */
const ENCODED_WORD_MAX_LENGTH = 52;

export function formatAddressList(value: AddressList): string {
  return Array.isArray(value) ? value.join(', ') : value;
}

/**
 * RFC 2047 encoding of a subject line. ASCII subjects are returned as is.
 */
export function encodeSubject(subject: string): string {
  return mimeFuncs.encodeWords(subject, 'Q', ENCODED_WORD_MAX_LENGTH);
}

/**
 * Append To, Cc, Bcc, From, Subject and Content-type (in that order) to the
 * request's own header list for every field that is present and non-empty,
 * removing the field from the request.
 */
export function buildHeader(email: EmailRequest): HeaderPair[] {
  const header: HeaderPair[] = email.header ?? [];

  for (const [field, name] of HEADER_ORDER) {
    const value = takeField(email, field);
    if (value === undefined) continue;
    header.push([name, value]);
  }

  email.header = header;
  return header;
}

function takeField(email: EmailRequest, field: HeaderField): string | undefined {
  switch (field) {
    case 'to':
    case 'cc':
    case 'bcc': {
      const value = email[field];
      delete email[field];
      if (value === undefined || value.length === 0) return undefined;
      return formatAddressList(value);
    }
    case 'subject': {
      const value = email.subject;
      delete email.subject;
      return value ? encodeSubject(value) : undefined;
    }
    case 'from':
    case 'contentType': {
      const value = email[field];
      delete email[field];
      return value || undefined;
    }
  }
}
