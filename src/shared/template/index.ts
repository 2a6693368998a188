import { readFile } from 'node:fs/promises';
import type { RedactionTemplate } from '../types';
import { parseTemplate } from './schema';

export { parseTemplate, serializeTemplate, TemplateSchema, type TemplateDocument } from './schema';

export const DEFAULT_TEMPLATE_ID = 'tpl_01_default';

export const BUILT_IN_TEMPLATES: readonly RedactionTemplate[] = [
  parseTemplate({ id: DEFAULT_TEMPLATE_ID, name: 'Default (Solid)', style: { default: 'SOLID' }, ocr_conf: 60 }),
  parseTemplate({ id: 'tpl_02_social_share', name: 'Social Share Safe', style: { default: 'SOLID' }, ocr_conf: 70 }),
  // Bug reports keep plain URLs visible.
  parseTemplate({
    id: 'tpl_03_bug_report',
    name: 'Bug Report Safe',
    style: { default: 'BLUR' },
    ocr_conf: 60,
    url_flag_query_params: false
  })
];

export function getBuiltInTemplate(id: string): RedactionTemplate | undefined {
  return BUILT_IN_TEMPLATES.find((template) => template.id === id);
}

export async function loadTemplateFile(filePath: string): Promise<RedactionTemplate> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Could not read template file ${filePath}: ${reason}`);
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Template file ${filePath} is not valid JSON: ${reason}`);
  }

  return parseTemplate(document);
}

export async function resolveTemplate(reference: string | undefined): Promise<RedactionTemplate> {
  const id = reference ?? DEFAULT_TEMPLATE_ID;
  const builtIn = getBuiltInTemplate(id);
  if (builtIn) {
    return builtIn;
  }
  if (reference === undefined) {
    throw new Error(`Built-in template ${DEFAULT_TEMPLATE_ID} is missing.`);
  }
  return loadTemplateFile(reference);
}

/** Entries containing `@` are trusted emails; anything else is a trusted domain. */
export function withTrustedEntries(template: RedactionTemplate, entries: readonly string[]): RedactionTemplate {
  const emails = new Set(template.ignore.emails);
  const domains = new Set(template.ignore.domains);

  for (const entry of entries) {
    const trimmed = entry.trim();
    if (!trimmed) {
      continue;
    }
    if (trimmed.includes('@')) {
      emails.add(trimmed);
    } else {
      domains.add(trimmed);
    }
  }

  return {
    ...template,
    ignore: { emails: Array.from(emails), domains: Array.from(domains) }
  };
}
