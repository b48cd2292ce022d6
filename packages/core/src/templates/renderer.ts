import path from 'path';
import fs from 'fs-extra';
import { TemplateError } from '@release-stager/shared';
import { HEADER_TEMPLATE, README_TEMPLATE } from './builtin';

export type TemplateId = 'HEADER' | 'README';

export type TemplateVariables = Record<string, string | undefined>;

export const TEMPLATE_FILES: Record<TemplateId, string> = {
  HEADER: 'HEADER.html',
  README: 'README.html',
};

const BUILTIN_TEMPLATES: Record<TemplateId, string> = {
  HEADER: HEADER_TEMPLATE,
  README: README_TEMPLATE,
};

const PLACEHOLDER = /\{\{\s*([A-Za-z][A-Za-z0-9_]*)\s*\}\}/g;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Substitutes `{{name}}` placeholders with HTML-escaped values.
 * A placeholder with no value is an error; unused variables are ignored.
 */
export function renderTemplate(id: TemplateId, source: string, variables: TemplateVariables): string {
  return source.replace(PLACEHOLDER, (_match, name: string) => {
    const value = variables[name];
    if (value === undefined) {
      throw new TemplateError(id, `missing value for "${name}"`);
    }
    return escapeHtml(value);
  });
}

export interface TemplateRendererOptions {
  /** Directory with HEADER.html and/or README.html replacing the built-in templates */
  directory?: string;
}

export class TemplateRenderer {
  private readonly directory?: string;

  constructor(options: TemplateRendererOptions = {}) {
    this.directory = options.directory;
  }

  async load(id: TemplateId): Promise<string> {
    if (!this.directory) {
      return BUILTIN_TEMPLATES[id];
    }
    const file = path.join(this.directory, TEMPLATE_FILES[id]);
    try {
      if (!(await fs.pathExists(file))) {
        return BUILTIN_TEMPLATES[id];
      }
      return await fs.readFile(file, 'utf8');
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TemplateError(id, `unable to read ${file}: ${message}`, { cause: error });
    }
  }

  async render(id: TemplateId, variables: TemplateVariables = {}): Promise<string> {
    return renderTemplate(id, await this.load(id), variables);
  }
}
