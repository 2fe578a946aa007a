/**
 * MIME Message
 *
 * Plain description of a message (ordered headers, attributes, body or
 * parts) handed between the views and the transports. Encoding is left to
 * nodemailer's MimeNode; this module only maps the description onto it.
 *
 * @module services/email/mimeMessage
 */

import * as mimeFuncs from 'nodemailer/lib/mime-funcs';
import MimeNode from 'nodemailer/lib/mime-node';

// ========================================
// TYPES
// ========================================

/** One header line. Order is kept and duplicate names are allowed. */
export type HeaderPair = [name: string, value: string];

export interface MimeAttributes {
  contentType?: string;
  charset?: string;
  disposition?: 'inline' | 'attachment';
  filename?: string;
  encoding?: 'base64' | 'quoted-printable' | '7bit' | '8bit';
}

export interface MimeCreateOptions {
  header?: HeaderPair[];
  attributes?: MimeAttributes;
  body?: string | Buffer;
  parts?: MimeMessage[];
}

export interface MessageEnvelope {
  from: string | false;
  to: string[];
}

const DEFAULT_CONTENT_TYPE = 'text/plain';
const DEFAULT_MULTIPART_TYPE = 'multipart/mixed';

// ========================================
// MESSAGE
// ========================================

export class MimeMessage {
  readonly header: HeaderPair[];
  readonly attributes: MimeAttributes;
  readonly body?: string | Buffer;
  readonly parts: MimeMessage[];

  private constructor(options: MimeCreateOptions) {
    this.header = options.header ? [...options.header] : [];
    this.parts = options.parts ? [...options.parts] : [];
    this.body = this.parts.length > 0 ? undefined : options.body;
    this.attributes = { ...options.attributes };

    const contentType = this.attributes.contentType ?? headerValue(this.header, 'Content-Type');
    if (this.parts.length > 0 && !isMultipart(contentType)) {
      this.attributes.contentType = DEFAULT_MULTIPART_TYPE;
    } else if (!this.attributes.contentType) {
      this.attributes.contentType = contentType ?? DEFAULT_CONTENT_TYPE;
    }
  }

  /**
   * Build a message from headers plus either a body or a list of parts.
   * A message with parts whose content type is not multipart/* becomes
   * multipart/mixed.
   */
  static create(options: MimeCreateOptions): MimeMessage {
    return new MimeMessage(options);
  }

  get contentType(): string {
    return this.attributes.contentType ?? DEFAULT_CONTENT_TYPE;
  }

  get isMultipart(): boolean {
    return this.parts.length > 0;
  }

  /** First value of a header, matched case-insensitively. */
  getHeader(name: string): string | undefined {
    return headerValue(this.header, name);
  }

  /** Every value of a header, in order. */
  getHeaderAll(name: string): string[] {
    const wanted = name.toLowerCase();
    return this.header.filter(([key]) => key.toLowerCase() === wanted).map(([, value]) => value);
  }

  /** Body as text; parts are not included. */
  bodyText(): string {
    if (this.body === undefined) return '';
    return typeof this.body === 'string' ? this.body : this.body.toString('utf8');
  }

  /**
   * Depth-first search for the first leaf part of the given content type.
   */
  findPart(contentType: string): MimeMessage | undefined {
    if (!this.isMultipart) {
      return this.contentType === contentType ? this : undefined;
    }
    for (const part of this.parts) {
      const found = part.findPart(contentType);
      if (found) return found;
    }
    return undefined;
  }

  toMimeNode(parent?: MimeNode): MimeNode {
    const contentType = this.contentTypeHeader();
    const node = parent ? parent.createChild(contentType) : new MimeNode(contentType);

    for (const [key, value] of this.header) {
      // Content-Type travels on the node itself
      if (key.toLowerCase() === 'content-type') continue;
      node.addHeader(key, value);
    }

    if (this.attributes.disposition) {
      const filename = this.attributes.filename ? `; filename="${this.attributes.filename}"` : '';
      node.setHeader('Content-Disposition', `${this.attributes.disposition}${filename}`);
    }
    if (this.attributes.encoding) {
      node.setHeader('Content-Transfer-Encoding', this.attributes.encoding);
    }

    if (this.isMultipart) {
      for (const part of this.parts) {
        part.toMimeNode(node);
      }
    } else {
      node.setContent(this.body ?? '');
    }

    return node;
  }

  /** Encoded RFC 822 message. Bcc is left out of the output. */
  build(): Promise<Buffer> {
    const node = this.toMimeNode();
    return new Promise((resolve, reject) => {
      node.build((err, buf) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(buf);
      });
    });
  }

  async asString(): Promise<string> {
    const raw = await this.build();
    return raw.toString('utf8');
  }

  /** SMTP envelope taken from the From/To/Cc/Bcc headers. */
  getEnvelope(): MessageEnvelope {
    const envelope = this.toMimeNode().getEnvelope();
    return { from: envelope.from, to: [...envelope.to] };
  }

  private contentTypeHeader(): string {
    if (this.attributes.charset && !this.isMultipart) {
      return `${this.contentType}; charset=${this.attributes.charset}`;
    }
    return this.contentType;
  }
}

// ========================================
// HELPERS
// ========================================

/**
 * Splits `text/html; charset=iso-8859-1` into the bare type and its charset
 * parameter. Other parameters are dropped.
 */
export function splitContentType(value: string): { contentType: string; charset?: string } {
  const parsed = mimeFuncs.parseHeaderValue(value);
  const charset = parsed.params.charset;
  return typeof charset === 'string' && charset
    ? { contentType: parsed.value, charset }
    : { contentType: parsed.value };
}

function headerValue(header: HeaderPair[], name: string): string | undefined {
  const wanted = name.toLowerCase();
  const match = header.find(([key]) => key.toLowerCase() === wanted);
  return match?.[1];
}

function isMultipart(contentType: string | undefined): boolean {
  return !!contentType && contentType.toLowerCase().startsWith('multipart/');
}
