/**
 * Email views for Express
 *
 * Architecture layers:
 * 1. Request (services/email/emailRequest.ts) - Stash contract
 * 2. Assembly (services/email/headerBuilder.ts, mimeMessage.ts) - Headers and MIME structure
 * 3. Transport (services/email/emailTransport.ts) - Named delivery backends
 * 4. Views (views/) - EmailView and TemplateEmailView
 * 5. Framework (framework/) - Request context, view registry, forwarding
 *
 * @module express-email-view
 */

// Views
export { EmailView, parseConfigBlock, type EmailViewOptions } from './views/emailView';
export { TemplateEmailView, guessContentType, type ResolvedTemplate } from './views/templateEmailView';

// Configuration
export {
  EmailViewConfigSchema,
  TemplateViewConfigSchema,
  parseEmailViewConfig,
  parseTemplateViewConfig,
  normalizeMailerArgs,
  type EmailViewConfig,
  type EmailViewConfigInput,
  type TemplateViewConfig,
  type TemplateViewConfigInput,
  type MailerArgs,
} from './config/viewConfig';
export { parseEnv, emailViewConfigFromEnv, loadConfig, type Env, type AppConfig } from './config/env';

// Request and message
export {
  EmailRequestSchema,
  TemplateSpecSchema,
  isEmailRequest,
  describeEmailRequestIssues,
  type AddressList,
  type EmailRequest,
  type TemplateSpec,
} from './services/email/emailRequest';
export { buildHeader, encodeSubject, formatAddressList, HEADER_ORDER } from './services/email/headerBuilder';
export {
  MimeMessage,
  type HeaderPair,
  type MimeAttributes,
  type MimeCreateOptions,
  type MessageEnvelope,
} from './services/email/mimeMessage';

// Transports
export {
  TransportRegistry,
  NodemailerTransport,
  TestTransport,
  createDefaultTransportRegistry,
  defaultTransportRegistry,
  DEFAULT_MAILER_ORDER,
  type MailTransport,
  type TransportFactory,
  type SendResult,
  type Delivery,
} from './services/email/emailTransport';

// Errors
export {
  EmailViewError,
  EMAIL_ERROR_CODES,
  isEmailViewError,
  describeError,
  type EmailErrorCode,
} from './services/email/emailErrors';

// Framework
export {
  createRequestContext,
  contextFromExpress,
  canRender,
  canProcess,
  type RequestContext,
  type ProcessingView,
  type RenderingView,
  type View,
  type Stash,
  type ContextOptions,
} from './framework/context';
export { ViewRegistry } from './framework/viewRegistry';
export { forward, emailViewMiddleware } from './framework/forward';
export { ExpressRenderView } from './framework/expressRenderView';
export { emailErrorMiddleware, type EmailErrorBody } from './middleware/emailErrorMiddleware';
export {
  placeholderEngine,
  renderTemplate,
  loadTemplate,
  clearTemplateCache,
  type TemplateVariables,
} from './templates/placeholderEngine';
