/**
 * Environment Configuration Module
 *
 * Single source of truth for the environment variables the email views read.
 * Validates and normalizes configuration with sensible defaults.
 * Uses Zod for type-safe validation.
 *
 * Usage:
 *   import { loadConfig } from './config/env';
 *   const config = loadConfig();
 *   const view = new EmailView(config.view);
 *
 * @module config/env
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import type { TemplateViewConfigInput } from './viewConfig';

// Load environment variables immediately when this module is imported
dotenv.config();

// ========================================
// ENVIRONMENT SCHEMA
// ========================================

const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'verbose']).default('info'),
  EMAIL_DEBUG: z.string().transform((v) => v === 'true').default('false'),

  // View
  EMAIL_STASH_KEY: z.string().min(1).default('email'),
  EMAIL_CONTENT_TYPE: z.string().optional(),
  EMAIL_DEFAULT_CONTENT_TYPE: z.string().default('text/plain'),
  EMAIL_DEFAULT_CHARSET: z.string().optional(),

  // Transport
  EMAIL_MAILER: z.string().optional(),
  EMAIL_SMTP_HOST: z.string().optional(),
  EMAIL_SMTP_PORT: z.string().regex(/^\d+$/).transform(Number).optional(),
  EMAIL_SMTP_SECURE: z.string().transform((v) => v === 'true').default('false'),
  EMAIL_SMTP_USER: z.string().optional(),
  EMAIL_SMTP_PASS: z.string().optional(),
  EMAIL_SENDMAIL_PATH: z.string().optional(),

  // Templates
  EMAIL_TEMPLATE_PREFIX: z.string().default(''),
  EMAIL_DEFAULT_VIEW: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

// ========================================
// PARSE AND VALIDATE
// ========================================

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${issues.join('; ')}`);
  }

  return result.data;
}

// ========================================
// DERIVED CONFIGURATION
// ========================================

/**
 * Transport arguments for the configured mailer, in the shape the matching
 * transport factory expects.
 */
function mailerArgsFromEnv(env: Env): Record<string, unknown> | undefined {
  switch ((env.EMAIL_MAILER ?? '').toLowerCase()) {
    case 'smtp':
    case '': {
      if (!env.EMAIL_SMTP_HOST) return undefined;
      return {
        host: env.EMAIL_SMTP_HOST,
        port: env.EMAIL_SMTP_PORT,
        secure: env.EMAIL_SMTP_SECURE,
        ...(env.EMAIL_SMTP_USER
          ? { auth: { user: env.EMAIL_SMTP_USER, pass: env.EMAIL_SMTP_PASS ?? '' } }
          : {}),
      };
    }
    case 'sendmail':
      return env.EMAIL_SENDMAIL_PATH ? { path: env.EMAIL_SENDMAIL_PATH } : undefined;
    default:
      return undefined;
  }
}

/**
 * Email view configuration derived from environment variables. The result
 * also carries the template view settings, which the plain email view
 * ignores.
 */
export function emailViewConfigFromEnv(env: Env = parseEnv()): TemplateViewConfigInput {
  return {
    stashKey: env.EMAIL_STASH_KEY,
    contentType: env.EMAIL_CONTENT_TYPE,
    default: {
      contentType: env.EMAIL_DEFAULT_CONTENT_TYPE,
      charset: env.EMAIL_DEFAULT_CHARSET,
    },
    sender: {
      mailer: env.EMAIL_MAILER,
      mailerArgs: mailerArgsFromEnv(env),
    },
    templatePrefix: env.EMAIL_TEMPLATE_PREFIX,
    defaultView: env.EMAIL_DEFAULT_VIEW,
  };
}

/**
 * Typed configuration object derived from environment variables
 */
export function loadConfig(env: Env = parseEnv()) {
  return {
    nodeEnv: env.NODE_ENV,
    isTest: env.NODE_ENV === 'test',
    logLevel: env.LOG_LEVEL,
    debug: env.EMAIL_DEBUG,
    view: emailViewConfigFromEnv(env),
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;
