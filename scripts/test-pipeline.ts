import assert from 'node:assert/strict';
import type { OcrToken } from '../src/shared/ocr/types';
import { redactImage, runDetectionPass } from '../src/shared/pipeline';
import type { RasterImage } from '../src/shared/redaction/image/types';
import { createManualRegion } from '../src/shared/redaction/regions';
import { getBuiltInTemplate, parseTemplate } from '../src/shared/template';
import type { RedactionTemplate } from '../src/shared/types';

function line(...texts: string[]): OcrToken[] {
  let x = 0;
  return texts.map((text) => {
    const token = { text, x, y: 0, w: text.length * 10, h: 10, confidence: 90 };
    x += token.w + 10;
    return token;
  });
}

function builtIn(id: string): RedactionTemplate {
  const template = getBuiltInTemplate(id);
  assert(template, `missing built-in template ${id}`);
  return template;
}

const SAMPLE = line(
  'Contact:',
  'bob@example.com',
  'Docs:',
  'https://docs.example.org/guide',
  'Reset:',
  'https://app.example.org/reset?token=abc'
);

let checks = 0;

function runSelectionTests(): void {
  const pass = runDetectionPass(SAMPLE, builtIn('tpl_01_default'));
  assert.deepEqual(pass.items.map((item) => item.piiType), ['email', 'url', 'url']);
  assert.deepEqual(pass.regions.map((region) => region.selected), [true, false, true]);
  assert.equal(pass.tokens.length, SAMPLE.length);
  checks += 3;

  const bugReport = runDetectionPass(SAMPLE, builtIn('tpl_03_bug_report'));
  assert.deepEqual(bugReport.regions.map((region) => region.selected), [true, true, true]);
  checks += 1;
}

function runDetectorFlagTests(): void {
  const noEmail = parseTemplate({ id: 't', name: 'No email', detectors: { email: false } });
  const pass = runDetectionPass(SAMPLE, noEmail);
  assert.deepEqual(pass.items.map((item) => item.piiType), ['url', 'url'], 'the email does not come back as a domain');
  checks += 1;

  const noHostname = parseTemplate({ id: 't', name: 'No hostname', detectors: { hostname: false } });
  assert.deepEqual(runDetectionPass(line('Domain:', 'example.com'), noHostname).items, []);
  const withHostname = parseTemplate({ id: 't', name: 'Hostname' });
  assert.deepEqual(runDetectionPass(line('Domain:', 'example.com'), withHostname).items.map((item) => item.piiType), ['domain']);
  checks += 2;

  const rulesOnly = parseTemplate({
    id: 't',
    name: 'Rules only',
    detectors: { email: false, phone: false, ipv4: false, hostname: false, url: false, face: true },
    custom_rules: [{ name: 'Ticket', regex: 'TICKET-\\d+' }]
  });
  const custom = runDetectionPass(line('bob@example.com', 'TICKET-7'), rulesOnly);
  assert.deepEqual(custom.items.map((item) => [item.piiType, item.matchedText]), [['custom', 'Ticket']]);
  assert.deepEqual(custom.regions.map((region) => [region.x, region.w, region.label]), [[160, 80, 'Ticket']]);
  checks += 2;

  const ignoring = parseTemplate({ id: 't', name: 'Trusted', ignore: { emails: ['bob@example.com'] } });
  assert.deepEqual(runDetectionPass(SAMPLE, ignoring).items.map((item) => item.piiType), ['url', 'url']);
  checks += 1;

  assert.deepEqual(runDetectionPass([], withHostname), { tokens: [], items: [], regions: [] });
  checks += 1;
}

async function runManualOnlyTests(): Promise<void> {
  const image: RasterImage = { data: Buffer.alloc(20 * 20 * 3, 255), width: 20, height: 20, channels: 3 };
  const manual = createManualRegion(0, 0, 5, 5);

  const result = await redactImage(Buffer.alloc(0), image, builtIn('tpl_03_bug_report'), {
    detect: false,
    style: 'solid',
    manualRegions: [manual]
  });

  assert.deepEqual(result.items, []);
  assert.deepEqual(result.regions, [manual]);
  assert.deepEqual(Array.from(result.image.data.subarray(0, 3)), [0, 0, 0]);
  const lastOffset = (19 * 20 + 19) * 3;
  assert.deepEqual(Array.from(result.image.data.subarray(lastOffset, lastOffset + 3)), [255, 255, 255]);
  checks += 4;
}

async function main(): Promise<void> {
  runSelectionTests();
  runDetectorFlagTests();
  await runManualOnlyTests();

  console.log(`✅ Pipeline tests passed (${checks} checks).`);
}

void main();
