/**
 * Placeholder Template Engine Tests
 *
 * @module tests/templates/placeholderEngine
 */

import path from 'path';
import { clearTemplateCache, loadTemplate, placeholderEngine, renderTemplate } from '../../templates/placeholderEngine';

const GREETING = path.join(__dirname, '../fixtures/templates/email/greeting.tt');

const renderFile = (filePath: string, variables: object) =>
  new Promise<string | undefined>((resolve, reject) => {
    placeholderEngine({ cache: false })(filePath, variables, (err, rendered) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(rendered);
    });
  });

describe('Placeholder Engine', () => {
  beforeEach(() => {
    clearTemplateCache();
  });

  describe('renderTemplate', () => {
    it('replaces placeholders with variables', () => {
      expect(renderTemplate('Sent at: {{{time}}}', { time: '1700000000' })).toBe('Sent at: 1700000000');
    });

    it('reaches into nested objects', () => {
      expect(renderTemplate('Hello {{{ email.to }}}', { email: { to: 'someone@example.com' } })).toBe(
        'Hello someone@example.com'
      );
    });

    it('joins lists', () => {
      expect(renderTemplate('To: {{{to}}}', { to: ['a@example.com', 'b@example.com'] })).toBe(
        'To: a@example.com, b@example.com'
      );
    });

    it('renders unknown names and objects as empty', () => {
      expect(renderTemplate('[{{{missing}}}][{{{email}}}][{{{email.to.name}}}]', { email: { to: 'x' } })).toBe('[][][]');
    });

    it('leaves double braces alone', () => {
      expect(renderTemplate('{{time}}', { time: '1' })).toBe('{{time}}');
    });
  });

  describe('loadTemplate', () => {
    it('reads the file', () => {
      expect(loadTemplate(GREETING)).toBe('Greetings from {{{stashKey}}}\n');
    });

    it('throws for a missing file', () => {
      expect(() => loadTemplate(path.join(__dirname, 'missing.tt'))).toThrow();
    });
  });

  describe('placeholderEngine', () => {
    it('renders a template file', async () => {
      expect(await renderFile(GREETING, { stashKey: 'email' })).toBe('Greetings from email\n');
    });

    it('reports a missing file through the callback', async () => {
      await expect(renderFile(path.join(__dirname, 'missing.tt'), {})).rejects.toThrow(/ENOENT/);
    });
  });
});
