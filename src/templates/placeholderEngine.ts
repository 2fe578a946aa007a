/**
 * Placeholder Template Engine
 *
 * Express view engine for plain text and HTML email templates.
 * Templates use Mustache-style {{{VARIABLE}}} placeholders; dotted names
 * reach into nested objects ({{{email.to}}}). Unknown names render empty.
 *
 *   app.engine('tt', placeholderEngine());
 *   app.set('views', path.join(__dirname, 'templates'));
 *
 * @module templates/placeholderEngine
 */

import * as fs from 'fs';

export type TemplateVariables = Record<string, unknown>;

type EngineCallback = (err: Error | null, rendered?: string) => void;

const PLACEHOLDER = /\{\{\{\s*([\w.-]+)\s*\}\}\}/g;

// ========================================
// TEMPLATE CACHE
// ========================================

// Cache loaded templates to avoid repeated file reads
const templateCache = new Map<string, string>();

/**
 * Load a template from file, through the cache when enabled.
 */
export function loadTemplate(filePath: string, useCache = true): string {
  const cached = useCache ? templateCache.get(filePath) : undefined;
  if (cached !== undefined) {
    return cached;
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  if (useCache) {
    templateCache.set(filePath, content);
  }
  return content;
}

/**
 * Clear the template cache
 * Useful for development/testing
 */
export function clearTemplateCache(): void {
  templateCache.clear();
}

// ========================================
// RENDERING
// ========================================

function lookup(variables: TemplateVariables, name: string): unknown {
  let current: unknown = variables;
  for (const key of name.split('.')) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

function stringify(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (Array.isArray(value)) return value.map(stringify).join(', ');
  if (typeof value === 'object') return '';
  return String(value);
}

/**
 * Render a template with variables
 * Replaces {{{NAME}}} with the corresponding value
 */
export function renderTemplate(template: string, variables: TemplateVariables): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => stringify(lookup(variables, name)));
}

/**
 * Express engine callback: `(filePath, options, callback)`. Templates are
 * cached unless the engine is created with `cache: false`.
 */
export function placeholderEngine(options: { cache?: boolean } = {}) {
  return (filePath: string, variables: object, callback: EngineCallback): void => {
    const data: TemplateVariables = { ...variables };
    const useCache = options.cache ?? true;

    let rendered: string;
    try {
      rendered = renderTemplate(loadTemplate(filePath, useCache), data);
    } catch (error: unknown) {
      callback(error instanceof Error ? error : new Error(String(error)));
      return;
    }
    callback(null, rendered);
  };
}
