/**
 * Email Routes E2E Tests
 *
 * Runs the example application in process with the Test transport.
 *
 * @module tests/routes/emailRoutes
 */

import path from 'path';
import request from 'supertest';
import { createApp } from '../../app';
import { TestTransport, TransportRegistry } from '../../services/email/emailTransport';
import type { MimeMessage } from '../../services/email/mimeMessage';

const VIEWS_DIR = path.join(__dirname, '../fixtures/templates');

const createTestApp = (transport = new TestTransport()) => {
  const transports = new TransportRegistry().register('Test', { available: () => true, create: () => transport });
  const { app } = createApp({ viewsDir: VIEWS_DIR, viewConfig: { sender: { mailer: 'Test' } }, transports });
  return { app, transport };
};

const deliveredMessage = (transport: TestTransport): MimeMessage => {
  const delivery = transport.lastDelivery();
  if (!delivery) throw new Error('Nothing was delivered');
  return delivery.message;
};

describe('Email Routes', () => {
  // =========================================
  // GET /email
  // =========================================
  describe('GET /email', () => {
    it('sends a plain email', async () => {
      const { app, transport } = createTestApp();

      const response = await request(app).get('/email').query({ time: '1700000000' });

      expect(response.status).toBe(200);
      expect(response.text).toBe('Plain Email Ok');

      const message = deliveredMessage(transport);
      expect(message.header).toEqual([
        ['To', 'test-email@example.com'],
        ['From', 'no-reply@example.com'],
        ['Subject', 'Email Test'],
      ]);
      expect(message.bodyText()).toBe('Email Sent at: 1700000000');
    });

    it('reports a failed send', async () => {
      const { app, transport } = createTestApp(new TestTransport({ failWith: 'Mailbox unavailable' }));

      const response = await request(app).get('/email');

      expect(response.status).toBe(500);
      expect(response.text).toBe('Email Failed');
      expect(transport.deliveries).toHaveLength(0);
    });
  });

  // =========================================
  // GET /template_email
  // =========================================
  describe('GET /template_email', () => {
    it('sends a multipart/alternative email rendered from templates', async () => {
      const { app, transport } = createTestApp();

      const response = await request(app).get('/template_email').query({ time: '1700000000' });

      expect(response.status).toBe(200);
      expect(response.text).toBe('Template Email Ok');

      const message = deliveredMessage(transport);
      expect(message.contentType).toBe('multipart/alternative');
      expect(message.getHeader('Subject')).toBe('Just a test');
      expect(message.parts.map((part) => part.contentType)).toEqual(['text/plain', 'text/html']);
      expect(message.parts[0].bodyText()).toBe(
        'Plain text email for test-email@example.com\nSent at: 1700000000\nRendered as text/plain\n'
      );
      expect(message.parts[1].bodyText()).toBe(
        '<html><body><p>HTML email for test-email@example.com</p><p>Sent at: 1700000000</p></body></html>\n'
      );
    });

    it('reports a failed send', async () => {
      const { app } = createTestApp(new TestTransport({ failWith: 'Mailbox unavailable' }));

      const response = await request(app).get('/template_email');

      expect(response.status).toBe(500);
      expect(response.text).toBe('Template Email Failed');
    });
  });

  // =========================================
  // POST /send
  // =========================================
  describe('POST /send', () => {
    it('sends the email in the request body', async () => {
      const { app, transport } = createTestApp();

      const response = await request(app)
        .post('/send')
        .send({ to: ['a@example.com', 'b@example.com'], from: 'no-reply@example.com', subject: 'Hello', body: 'Hi there' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ ok: true });
      expect(deliveredMessage(transport).header).toEqual([
        ['To', 'a@example.com, b@example.com'],
        ['From', 'no-reply@example.com'],
        ['Subject', 'Hello'],
      ]);
      expect(transport.lastDelivery()?.envelope.to).toEqual(['a@example.com', 'b@example.com']);
    });

    it('rejects an email without a body', async () => {
      const { app, transport } = createTestApp();

      const response = await request(app).post('/send').send({ to: 'a@example.com', subject: 'Hello' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        ok: false,
        error: { code: 'NO_BODY', message: "Can't send email without parts or body, check stash" },
      });
      expect(transport.deliveries).toHaveLength(0);
    });

    it('rejects a malformed email', async () => {
      const { app } = createTestApp();

      const response = await request(app).post('/send').send({ to: 42, body: 'x' });

      expect(response.status).toBe(400);
      expect(response.body.error).toEqual({
        code: 'INVALID_EMAIL',
        message: "Can't send email without a valid email structure",
      });
    });

    it('reports a transport failure as a bad gateway', async () => {
      const { app } = createTestApp(new TestTransport({ failWith: 'Mailbox unavailable' }));

      const response = await request(app).post('/send').send({ to: 'a@example.com', body: 'x' });

      expect(response.status).toBe(502);
      expect(response.body.error).toEqual({ code: 'SEND_FAILED', message: 'Mailbox unavailable' });
    });
  });
});
