import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { TemplateError } from '@release-stager/shared';
import { TemplateRenderer, escapeHtml, renderTemplate } from './renderer';

describe('renderTemplate', () => {
  it('substitutes placeholders', () => {
    expect(renderTemplate('README', '{{artifactId}}-{{ version }}', { artifactId: 'foo', version: '1.0' })).toBe(
      'foo-1.0',
    );
  });

  it('escapes values', () => {
    expect(renderTemplate('README', '<a href="{{siteUrl}}">', { siteUrl: 'https://example.org/?a=1&b="2"' })).toBe(
      '<a href="https://example.org/?a=1&amp;b=&quot;2&quot;">',
    );
  });

  it('accepts an empty string as a value', () => {
    expect(renderTemplate('README', '[{{siteUrl}}]', { siteUrl: '' })).toBe('[]');
  });

  it('throws TemplateError for a placeholder without a value', () => {
    expect(() => renderTemplate('README', '{{artifactId}} {{version}}', { artifactId: 'foo' })).toThrow(
      'Template "README": missing value for "version"',
    );
    expect(() => renderTemplate('HEADER', '{{x}}', {})).toThrow(TemplateError);
  });
});

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<b>'x' & "y"</b>`)).toBe('&lt;b&gt;&#39;x&#39; &amp; &quot;y&quot;&lt;/b&gt;');
  });
});

describe('TemplateRenderer', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'templates-'));
  });

  afterEach(async () => {
    await fs.remove(tmpDir);
  });

  it('renders the built-in README with project coordinates', async () => {
    const html = await new TemplateRenderer().render('README', {
      artifactId: 'foo',
      version: '1.0',
      siteUrl: 'https://foo.example.org',
    });

    expect(html).toContain('<h2>foo 1.0</h2>');
    expect(html).toContain('<a href="https://foo.example.org">https://foo.example.org</a>');
  });

  it('renders the built-in HEADER without variables', async () => {
    const html = await new TemplateRenderer().render('HEADER');
    expect(html).toContain('<h2>Release distribution area</h2>');
  });

  it('prefers a template from the override directory', async () => {
    await fs.writeFile(path.join(tmpDir, 'README.html'), '<p>{{artifactId}}</p>');
    const renderer = new TemplateRenderer({ directory: tmpDir });

    expect(await renderer.render('README', { artifactId: 'foo' })).toBe('<p>foo</p>');
    expect(await renderer.render('HEADER')).toContain('Release distribution area');
  });

  it('wraps read failures in TemplateError', async () => {
    await fs.ensureDir(path.join(tmpDir, 'HEADER.html'));
    const renderer = new TemplateRenderer({ directory: tmpDir });

    await expect(renderer.render('HEADER')).rejects.toMatchObject({
      code: 'TemplateError',
      templateId: 'HEADER',
    });
  });
});
