/**
 * Template Email View Tests
 *
 * Rendering goes through an in-memory rendering view, so these tests do not
 * depend on a template engine.
 *
 * @module tests/views/templateEmailView
 */

import {
  createRequestContext,
  type RenderingView,
  type RequestContext,
  type Stash,
} from '../../framework/context';
import { ViewRegistry } from '../../framework/viewRegistry';
import { TestTransport, TransportRegistry } from '../../services/email/emailTransport';
import type { MimeMessage } from '../../services/email/mimeMessage';
import { TemplateEmailView, guessContentType } from '../../views/templateEmailView';
import { testUtils } from '../setup';

class FakeRenderer implements RenderingView {
  readonly calls: Array<{ template: string; extraStash: Stash }> = [];

  constructor(private readonly outputs: Record<string, string | Error> = {}) {}

  async render(_ctx: RequestContext, template: string, extraStash: Stash = {}): Promise<string | Error> {
    this.calls.push({ template, extraStash });
    return this.outputs[template] ?? `rendered ${template}`;
  }
}

const createView = (config: ConstructorParameters<typeof TemplateEmailView>[0] = {}) => {
  const transport = new TestTransport();
  const transports = new TransportRegistry().register('Test', { available: () => true, create: () => transport });
  const view = new TemplateEmailView({ templatePrefix: 'email', ...config, sender: { mailer: 'Test' } }, { transports });
  return { view, transport };
};

const createContext = (stash: Stash, renderer: RenderingView = new FakeRenderer()) =>
  createRequestContext({ stash, views: new ViewRegistry().register('TT', renderer) });

const deliveredMessage = (transport: TestTransport): MimeMessage => {
  const delivery = transport.lastDelivery();
  if (!delivery) throw new Error('Nothing was delivered');
  return delivery.message;
};

const templateEmail = () =>
  testUtils.createEmailRequest({
    subject: 'Just a test',
    body: undefined,
    contentType: 'multipart/alternative',
    templates: ['text_plain/test.tt', 'text_html/test.tt'],
  });

describe('TemplateEmailView', () => {
  // =========================================
  // process
  // =========================================
  describe('process', () => {
    it('renders one part per template', async () => {
      const { view, transport } = createView();
      const renderer = new FakeRenderer();

      await view.process(createContext({ email: templateEmail(), time: '1700000000' }, renderer));

      const message = deliveredMessage(transport);
      expect(message.contentType).toBe('multipart/alternative');
      expect(message.parts.map((part) => part.contentType)).toEqual(['text/plain', 'text/html']);
      expect(message.parts.map((part) => part.bodyText())).toEqual([
        'rendered email/text_plain/test.tt',
        'rendered email/text_html/test.tt',
      ]);
      expect(message.header).toEqual([
        ['To', 'test-email@example.com'],
        ['From', 'no-reply@example.com'],
        ['Subject', 'Just a test'],
        ['Content-type', 'multipart/alternative'],
      ]);
    });

    it('hands the content type, stash key and stash to the renderer', async () => {
      const { view } = createView();
      const renderer = new FakeRenderer();

      await view.process(createContext({ email: templateEmail(), time: '1700000000' }, renderer));

      expect(renderer.calls.map((call) => call.template)).toEqual(['email/text_plain/test.tt', 'email/text_html/test.tt']);
      expect(renderer.calls[0].extraStash).toMatchObject({
        contentType: 'text/plain',
        stashKey: 'email',
        time: '1700000000',
      });
      expect(renderer.calls[1].extraStash.contentType).toBe('text/html');
    });

    it('renders a single template', async () => {
      const { view, transport } = createView();
      const email = testUtils.createEmailRequest({ body: undefined, template: 'greeting.tt' });

      await view.process(createContext({ email }));

      const message = deliveredMessage(transport);
      expect(message.parts).toHaveLength(1);
      expect(message.parts[0].contentType).toBe('text/plain');
      expect(message.contentType).toBe('multipart/mixed');
    });

    it('prefers the templates list over a single template', async () => {
      const { view } = createView();
      const renderer = new FakeRenderer();
      const email = testUtils.createEmailRequest({ template: 'greeting.tt', templates: ['text_html/test.tt'] });

      await view.process(createContext({ email }, renderer));

      expect(renderer.calls.map((call) => call.template)).toEqual(['email/text_html/test.tt']);
    });

    it('replaces the body and appends to parts already in the request', async () => {
      const { view, transport } = createView();
      const email = testUtils.createEmailRequest({
        body: 'ignored',
        parts: [testUtils.createPart('application/pdf', '%PDF-1.4')],
        template: 'text_plain/test.tt',
      });

      await view.process(createContext({ email }));

      expect(email.body).toBeUndefined();
      expect(deliveredMessage(transport).parts.map((part) => part.contentType)).toEqual([
        'application/pdf',
        'text/plain',
      ]);
    });

    it('fails without a template', async () => {
      const { view, transport } = createView();

      await expect(view.process(createContext({ email: testUtils.createEmailRequest() }))).rejects.toMatchObject({
        code: 'NO_TEMPLATE',
        status: 400,
      });
      expect(transport.deliveries).toHaveLength(0);
    });
  });

  // =========================================
  // Template entries
  // =========================================
  describe('template entries', () => {
    it('uses the content type, charset and view given by an entry', async () => {
      const { view, transport } = createView();
      const other = new FakeRenderer();
      const email = testUtils.createEmailRequest({
        templates: [{ template: 'greeting.tt', contentType: 'text/html', charset: 'iso-8859-1', view: 'Other' }],
      });
      const ctx = createRequestContext({
        stash: { email },
        views: new ViewRegistry().register('TT', new FakeRenderer()).register('Other', other),
      });

      await view.process(ctx);

      const [part] = deliveredMessage(transport).parts;
      expect(part.contentType).toBe('text/html');
      expect(part.attributes.charset).toBe('iso-8859-1');
      expect(other.calls).toHaveLength(1);
    });

    it('reads the charset from an entry content type', async () => {
      const { view, transport } = createView({ default: { charset: 'utf-8' } });
      const email = testUtils.createEmailRequest({
        templates: [{ template: 'greeting.tt', contentType: 'text/html; charset=iso-8859-1' }],
      });

      await view.process(createContext({ email }));

      const [part] = deliveredMessage(transport).parts;
      expect(part.contentType).toBe('text/html');
      expect(part.attributes.charset).toBe('iso-8859-1');
    });

    it('applies the default charset to every part', async () => {
      const { view, transport } = createView({ default: { charset: 'utf-8' } });

      await view.process(createContext({ email: templateEmail() }));

      expect(deliveredMessage(transport).parts.map((part) => part.attributes.charset)).toEqual(['utf-8', 'utf-8']);
    });

    it('falls back to the default content type when none can be guessed', async () => {
      const { view, transport } = createView({ default: { contentType: 'text/html' } });
      const email = testUtils.createEmailRequest({ template: 'greeting.tt' });

      await view.process(createContext({ email }));

      expect(deliveredMessage(transport).parts[0].contentType).toBe('text/html');
    });
  });

  // =========================================
  // Rendering views
  // =========================================
  describe('rendering view', () => {
    it('uses the configured default view', async () => {
      const { view } = createView({ defaultView: 'Other' });
      const other = new FakeRenderer();
      const ctx = createRequestContext({
        stash: { email: templateEmail() },
        views: new ViewRegistry().register('TT', new FakeRenderer()).register('Other', other),
      });

      await view.process(ctx);

      expect(other.calls).toHaveLength(2);
    });

    it('fails when the view is not registered', async () => {
      const { view } = createView({ defaultView: 'Missing' });

      await expect(view.process(createContext({ email: templateEmail() }))).rejects.toMatchObject({
        code: 'VIEW_NOT_FOUND',
      });
    });

    it('fails when the view cannot render', async () => {
      const { view } = createView();
      const ctx = createRequestContext({
        stash: { email: templateEmail() },
        views: new ViewRegistry().register('Email', { process: async () => undefined }),
      });

      await expect(view.process(ctx)).rejects.toMatchObject({ code: 'VIEW_NOT_RENDERABLE' });
    });

    it('fails when rendering returns an error', async () => {
      const { view, transport } = createView();
      const renderer = new FakeRenderer({ 'email/text_plain/test.tt': new Error('Template not found') });

      await expect(view.process(createContext({ email: templateEmail() }, renderer))).rejects.toMatchObject({
        code: 'RENDER_FAILED',
        message: 'Template not found',
        details: { template: 'email/text_plain/test.tt' },
      });
      expect(transport.deliveries).toHaveLength(0);
    });

    it('fails when rendering throws', async () => {
      const { view } = createView();
      const renderer: RenderingView = {
        render: async () => {
          throw new Error('Engine crashed');
        },
      };

      await expect(view.process(createContext({ email: templateEmail() }, renderer))).rejects.toMatchObject({
        code: 'RENDER_FAILED',
        message: 'Engine crashed',
      });
    });
  });

  // =========================================
  // Paths and content types
  // =========================================
  describe('templatePath', () => {
    it('joins the prefix', () => {
      expect(createView().view.templatePath('text_plain/test.tt')).toBe('email/text_plain/test.tt');
    });

    it('strips leading slashes', () => {
      expect(createView({ templatePrefix: '' }).view.templatePath('/text_plain/test.tt')).toBe('text_plain/test.tt');
      expect(createView({ templatePrefix: '/email/' }).view.templatePath('/greeting.tt')).toBe('email/greeting.tt');
    });
  });

  describe('guessContentType', () => {
    it('reads the content type from the first directory', () => {
      expect(guessContentType('text_plain/test.tt')).toBe('text/plain');
      expect(guessContentType('TEXT_HTML/test.tt')).toBe('text/html');
      expect(guessContentType('/application_vnd.api+json/data.tt')).toBe('application/vnd.api+json');
    });

    it('returns undefined without a content type directory', () => {
      expect(guessContentType('test.tt')).toBeUndefined();
      expect(guessContentType('partials/footer.tt')).toBeUndefined();
    });
  });
});
