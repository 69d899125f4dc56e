/**
 * Markdown rendering from `templates/<templateId>.md`
 *
 * Templates use `{{field}}` placeholders. The rendered note starts with a
 * YAML frontmatter block; its `key` is what the document store reads back.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { stringify as stringifyYaml } from 'yaml';

import type { RenderFields, Renderer } from '../pipeline/types.js';

export const DEFAULT_TEMPLATE_DIR = fileURLToPath(new URL('../../templates/', import.meta.url));

/**
 * Fields copied into the frontmatter, in this order
 */
export const FRONTMATTER_FIELDS = [
  'key',
  'title',
  'authors',
  'year',
  'doi',
  'tags',
  'collections',
  'zoteroLink',
  'created',
] as const;

const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z][\w]*)\s*\}\}/g;
const TEMPLATE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

function fieldText(value: string | readonly string[] | undefined): string {
  if (value === undefined) return '';
  return typeof value === 'string' ? value : value.join(', ');
}

/**
 * Substitute `{{field}}` placeholders; unknown fields become empty
 */
export function fillTemplate(template: string, fields: RenderFields): string {
  return template.replace(PLACEHOLDER_PATTERN, (_match, name: string) => fieldText(fields[name]));
}

/**
 * YAML frontmatter block including the closing delimiter
 */
export function buildFrontmatter(fields: RenderFields): string {
  const data: Record<string, string | string[]> = {};
  for (const name of FRONTMATTER_FIELDS) {
    const value = fields[name];
    if (value === undefined || value === '') continue;
    data[name] = typeof value === 'string' ? value : [...value];
  }
  return `---\n${stringifyYaml(data)}---\n`;
}

export class TemplateRenderer implements Renderer {
  private readonly templates = new Map<string, string>();

  constructor(private readonly templateDir: string = DEFAULT_TEMPLATE_DIR) {}

  async render(templateId: string, fields: RenderFields): Promise<string> {
    const template = await this.load(templateId);
    const body = fillTemplate(template, fields).trimStart();
    return `${buildFrontmatter(fields)}\n${body}`;
  }

  private async load(templateId: string): Promise<string> {
    const cached = this.templates.get(templateId);
    if (cached !== undefined) return cached;

    if (!TEMPLATE_ID_PATTERN.test(templateId)) {
      throw new Error(`Invalid template id: ${templateId}`);
    }

    const path = join(this.templateDir, `${templateId}.md`);
    let template: string;
    try {
      template = await readFile(path, 'utf-8');
    } catch (error) {
      throw new Error(`Template not found: ${path}`, { cause: error });
    }

    this.templates.set(templateId, template);
    return template;
  }
}
