import { RenderError } from '../domain/errors';
import { RenderedContent } from '../domain/types';

export type EmailTemplate = {
  id: string;
  subject: string;
  html: string;
  text?: string;
  requiredFields?: string[];
};

export interface TemplateSource {
  getTemplate(templateId: string): Promise<EmailTemplate | null>;
}

export interface TemplateRenderer {
  render(templateId: string, fields: Record<string, string>): Promise<RenderedContent>;
}

const PLACEHOLDER = /\{\{\s*([\w.-]+)\s*(?:\|\s*([^}]*?)\s*)?\}\}/g;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * `{{field}}` substitution. `{{field | fallback}}` renders the fallback when
 * the field is absent or empty; a bare placeholder with no value fails.
 * `custom.` prefixes resolve against the same field map.
 */
export class PlaceholderTemplateRenderer implements TemplateRenderer {
  constructor(private readonly templates: TemplateSource) {}

  async render(templateId: string, fields: Record<string, string>): Promise<RenderedContent> {
    const template = await this.templates.getTemplate(templateId);
    if (!template) {
      throw new RenderError(templateId, null, `template_not_found:${templateId}`);
    }

    for (const field of template.requiredFields ?? []) {
      if (!lookup(fields, field)) {
        throw new RenderError(templateId, field);
      }
    }

    return {
      subject: substitute(templateId, template.subject, fields, (value) => value),
      html: substitute(templateId, template.html, fields, escapeHtml),
      text: template.text === undefined ? undefined : substitute(templateId, template.text, fields, (value) => value)
    };
  }
}

function lookup(fields: Record<string, string>, name: string): string | undefined {
  const direct = fields[name];
  if (direct !== undefined && direct !== '') {
    return direct;
  }
  if (name.startsWith('custom.')) {
    const custom = fields[name.slice('custom.'.length)];
    return custom === '' ? undefined : custom;
  }
  return undefined;
}

function substitute(
  templateId: string,
  source: string,
  fields: Record<string, string>,
  encode: (value: string) => string
): string {
  return source.replace(PLACEHOLDER, (_match, name: string, fallback: string | undefined) => {
    const value = lookup(fields, name);
    if (value !== undefined) {
      return encode(value);
    }
    if (fallback !== undefined) {
      return encode(fallback);
    }
    throw new RenderError(templateId, name);
  });
}
