import { z } from 'zod';
import { DEFAULT_OCR_CONFIDENCE } from '../file/security';
import type { RedactionStyle, RedactionTemplate } from '../types';

// Persisted templates keep the snake_case keys of the stored JSON documents.

const StyleNameSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(['solid', 'blur', 'pixelate']));

export const DetectorFlagsSchema = z.object({
  email: z.boolean().default(true),
  phone: z.boolean().default(true),
  ipv4: z.boolean().default(true),
  hostname: z.boolean().default(true),
  url: z.boolean().default(true),
  face: z.boolean().default(false)
}).strict();

export const CustomRuleSchema = z.object({
  name: z.string().min(1, 'name is required'),
  regex: z.string().min(1, 'regex is required')
}).strict();

export const TemplateSchema = z.object({
  id: z.string().min(1, 'id is required'),
  name: z.string().min(1, 'name is required'),
  version: z.number().int().positive().default(1),
  detectors: DetectorFlagsSchema.default({}),
  style: z.object({
    default: StyleNameSchema.default('solid')
  }).strict().default({}),
  ignore: z.object({
    emails: z.array(z.string()).default([]),
    domains: z.array(z.string()).default([])
  }).strict().default({}),
  export: z.object({
    format: z.enum(['png', 'original']).default('png')
  }).strict().default({}),
  ocr_conf: z.number().int().min(0).max(100).default(DEFAULT_OCR_CONFIDENCE),
  url_flag_query_params: z.boolean().default(true),
  custom_rules: z.array(CustomRuleSchema).default([])
}).strict();

export type TemplateDocument = z.input<typeof TemplateSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseTemplate(input: unknown): RedactionTemplate {
  const parsed = TemplateSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid redaction template: ${formatIssues(parsed.error)}`);
  }

  const data = parsed.data;
  const style: RedactionStyle = data.style.default;

  return {
    id: data.id,
    name: data.name,
    version: data.version,
    detectors: data.detectors,
    style,
    ignore: { emails: data.ignore.emails, domains: data.ignore.domains },
    export: { format: data.export.format },
    ocrConfidence: data.ocr_conf,
    flagQueryParamsOnly: data.url_flag_query_params,
    customRules: data.custom_rules.map((rule) => ({ name: rule.name, pattern: rule.regex }))
  };
}

export function serializeTemplate(template: RedactionTemplate): TemplateDocument {
  return {
    id: template.id,
    name: template.name,
    version: template.version,
    detectors: { ...template.detectors },
    style: { default: template.style.toUpperCase() },
    ignore: { emails: [...template.ignore.emails], domains: [...template.ignore.domains] },
    export: { format: template.export.format },
    ocr_conf: template.ocrConfidence,
    url_flag_query_params: template.flagQueryParamsOnly,
    custom_rules: template.customRules.map((rule) => ({ name: rule.name, regex: rule.pattern }))
  };
}
