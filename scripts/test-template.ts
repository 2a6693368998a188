import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  BUILT_IN_TEMPLATES,
  DEFAULT_TEMPLATE_ID,
  getBuiltInTemplate,
  loadTemplateFile,
  parseTemplate,
  resolveTemplate,
  serializeTemplate,
  withTrustedEntries
} from '../src/shared/template';

let checks = 0;

function runSchemaTests(): void {
  const minimal = parseTemplate({ id: 'tpl_test', name: 'Test' });
  assert.deepEqual(minimal, {
    id: 'tpl_test',
    name: 'Test',
    version: 1,
    detectors: { email: true, phone: true, ipv4: true, hostname: true, url: true, face: false },
    style: 'solid',
    ignore: { emails: [], domains: [] },
    export: { format: 'png' },
    ocrConfidence: 60,
    flagQueryParamsOnly: true,
    customRules: []
  });
  checks += 1;

  assert.equal(parseTemplate({ id: 't', name: 'T', style: { default: 'BLUR' } }).style, 'blur');
  assert.equal(parseTemplate({ id: 't', name: 'T', style: { default: ' Pixelate ' } }).style, 'pixelate');
  checks += 2;

  const withRules = parseTemplate({
    id: 't',
    name: 'T',
    detectors: { phone: false },
    custom_rules: [{ name: 'Ticket', regex: 'TICKET-\\d+' }]
  });
  assert.deepEqual(withRules.customRules, [{ name: 'Ticket', pattern: 'TICKET-\\d+' }]);
  assert.equal(withRules.detectors.phone, false);
  assert.equal(withRules.detectors.email, true);
  checks += 3;

  assert.throws(() => parseTemplate({ id: '', name: 'T' }), /Invalid redaction template: id: id is required/);
  assert.throws(() => parseTemplate({ id: 't', name: 'T', ocr_conf: 150 }), /ocr_conf/);
  assert.throws(() => parseTemplate({ id: 't', name: 'T', colour: 'red' }), /Invalid redaction template: \(root\)/);
  assert.throws(() => parseTemplate({ id: 't', name: 'T', style: { default: 'glitter' } }), /style\.default/);
  assert.throws(() => parseTemplate('not an object'), /Invalid redaction template/);
  checks += 5;

  const custom = parseTemplate({
    id: 'tpl_custom',
    name: 'Custom',
    style: { default: 'pixelate' },
    ignore: { emails: ['me@example.com'], domains: ['example.org'] },
    export: { format: 'original' },
    ocr_conf: 75,
    url_flag_query_params: false,
    custom_rules: [{ name: 'Order', regex: 'ORD\\d{6}' }]
  });
  const document = serializeTemplate(custom);
  assert.deepEqual(document.style, { default: 'PIXELATE' });
  assert.equal(document.ocr_conf, 75);
  assert.deepEqual(parseTemplate(document), custom);
  checks += 3;
}

function runBuiltInTests(): void {
  assert.deepEqual(BUILT_IN_TEMPLATES.map((template) => template.id), [
    'tpl_01_default',
    'tpl_02_social_share',
    'tpl_03_bug_report'
  ]);
  checks += 1;

  const social = getBuiltInTemplate('tpl_02_social_share');
  assert.equal(social?.ocrConfidence, 70);
  assert.equal(social?.style, 'solid');
  const bugReport = getBuiltInTemplate('tpl_03_bug_report');
  assert.equal(bugReport?.style, 'blur');
  assert.equal(bugReport?.flagQueryParamsOnly, false);
  assert.equal(getBuiltInTemplate('tpl_99_missing'), undefined);
  checks += 5;
}

function runTrustedEntryTests(): void {
  const base = parseTemplate({ id: 't', name: 'T', ignore: { emails: ['me@example.com'], domains: [] } });
  const trusted = withTrustedEntries(base, ['team@company.com', ' company.com ', '', 'me@example.com']);

  assert.deepEqual(trusted.ignore, {
    emails: ['me@example.com', 'team@company.com'],
    domains: ['company.com']
  });
  assert.deepEqual(base.ignore.emails, ['me@example.com'], 'the source template is not modified');
  checks += 2;
}

async function runFileTests(): Promise<void> {
  const directory = await mkdtemp(path.join(os.tmpdir(), 'shotveil-template-'));
  try {
    const validPath = path.join(directory, 'valid.json');
    await writeFile(validPath, JSON.stringify({ id: 'tpl_file', name: 'From File', ocr_conf: 80 }), 'utf-8');
    const loaded = await loadTemplateFile(validPath);
    assert.equal(loaded.id, 'tpl_file');
    assert.equal(loaded.ocrConfidence, 80);
    checks += 2;

    const resolved = await resolveTemplate(validPath);
    assert.equal(resolved.name, 'From File');
    checks += 1;

    const brokenPath = path.join(directory, 'broken.json');
    await writeFile(brokenPath, '{ "id": ', 'utf-8');
    await assert.rejects(loadTemplateFile(brokenPath), /is not valid JSON/);
    await assert.rejects(loadTemplateFile(path.join(directory, 'missing.json')), /Could not read template file/);
    checks += 2;
  } finally {
    await rm(directory, { recursive: true, force: true });
  }

  assert.equal((await resolveTemplate(undefined)).id, DEFAULT_TEMPLATE_ID);
  assert.equal((await resolveTemplate('tpl_03_bug_report')).style, 'blur');
  checks += 2;
}

async function main(): Promise<void> {
  runSchemaTests();
  runBuiltInTests();
  runTrustedEntryTests();
  await runFileTests();

  console.log(`✅ Template tests passed (${checks} checks).`);
}

void main();
