/**
 * Email View Errors
 *
 * Every failure in the view pipeline is raised as an EmailViewError carrying
 * one of the codes below. Nothing is retried locally; the host decides what
 * to do with the error (error list, next(err), JSON response).
 *
 * @module services/email/emailErrors
 */

// ========================================
// ERROR CODES
// ========================================

export const EMAIL_ERROR_CODES = {
  STASH_KEY_UNDEFINED: { status: 500, message: 'stashKey is not defined' },
  INVALID_CONFIGURATION: { status: 500, message: 'Invalid email view configuration' },
  TRANSPORT_UNAVAILABLE: { status: 500, message: 'Mail transport is not available' },
  INVALID_MAILER_ARGS: { status: 500, message: 'Invalid mailerArgs specified' },
  INVALID_EMAIL: { status: 400, message: "Can't send email without a valid email structure" },
  NO_BODY: { status: 400, message: "Can't send email without parts or body, check stash" },
  NO_TEMPLATE: { status: 400, message: 'No template specified for rendering' },
  VIEW_NOT_FOUND: { status: 500, message: 'Rendering view not found' },
  VIEW_NOT_RENDERABLE: { status: 500, message: 'Configured view does not have a render method' },
  RENDER_FAILED: { status: 500, message: 'Template rendering failed' },
  MESSAGE_NOT_CREATED: { status: 500, message: 'Unable to create message' },
  SEND_FAILED: { status: 502, message: 'Failed to send email' },
} as const;

export type EmailErrorCode = keyof typeof EMAIL_ERROR_CODES;

export class EmailViewError extends Error {
  public readonly status: number;

  constructor(
    public readonly code: EmailErrorCode,
    message: string = EMAIL_ERROR_CODES[code].message,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EmailViewError';
    this.status = EMAIL_ERROR_CODES[code].status;
  }
}

export function isEmailViewError(error: unknown): error is EmailViewError {
  return error instanceof EmailViewError;
}

/**
 * Message text of anything thrown or returned as a failure.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
