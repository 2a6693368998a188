import assert from 'node:assert/strict';
import { createManualRegion } from '../src/shared/redaction/regions';
import { buildRedactionReceipt, pluralTypeKey, summarizeRegions } from '../src/shared/stats';
import { PII_TYPES, describePiiType, type PiiType, type Region } from '../src/shared/types';

function detected(piiType: PiiType, label: string, selected = true): Region {
  return { piiType, label, x: 0, y: 0, w: 10, h: 10, selected, manual: false };
}

const REGIONS: Region[] = [
  detected('email', 'a@x.io'),
  detected('email', 'b@x.io'),
  detected('url', 'http://x.io', false),
  detected('phone', '555-1234'),
  createManualRegion(0, 0, 40, 40),
  detected('custom', 'Ticket')
];

let checks = 0;

function runSummaryTests(): void {
  assert.deepEqual(summarizeRegions(REGIONS), [
    { type: 'email', count: 2, samples: ['a@x.io', 'b@x.io'] },
    { type: 'phone', count: 1, samples: ['555-1234'] },
    { type: 'custom', count: 1, samples: ['Ticket'] }
  ]);
  checks += 1;

  const repeated = ['a@x.io', 'a@x.io', 'b@x.io', 'c@x.io', 'd@x.io'].map((label) => detected('email', label));
  assert.deepEqual(summarizeRegions(repeated), [
    { type: 'email', count: 5, samples: ['a@x.io', 'b@x.io', 'c@x.io'] }
  ]);
  checks += 1;

  assert.deepEqual(summarizeRegions([]), []);
  checks += 1;
}

function runReceiptTests(): void {
  const receipt = buildRedactionReceipt({
    originalFile: 'screenshot.png',
    redactedFile: 'screenshot.redacted.png',
    templateId: 'tpl_01_default',
    regions: REGIONS,
    processedAt: new Date('2024-05-01T12:00:00.000Z')
  });

  assert.deepEqual(receipt, {
    original_file: 'screenshot.png',
    redacted_file: 'screenshot.redacted.png',
    template_id: 'tpl_01_default',
    pii_counts: { emails: 2, phones: 1, customs: 1 },
    manual_regions: 1,
    total_redactions: 5,
    processed_at: '2024-05-01T12:00:00.000Z'
  });
  checks += 1;

  const empty = buildRedactionReceipt({
    originalFile: 'a.png',
    redactedFile: 'b.png',
    templateId: 't',
    regions: [detected('url', 'http://x.io', false)],
    processedAt: new Date(0)
  });
  assert.deepEqual(empty.pii_counts, {});
  assert.equal(empty.total_redactions, 0);
  assert.equal(empty.processed_at, '1970-01-01T00:00:00.000Z');
  checks += 3;
}

function runLabelTests(): void {
  assert.equal(pluralTypeKey('ip'), 'ips');
  assert.deepEqual(PII_TYPES.map((type) => describePiiType(type)), [
    'Email Address',
    'IP Address',
    'Domain',
    'URL',
    'Phone Number',
    'Face',
    'Custom Rule'
  ]);
  checks += 2;
}

function main(): void {
  runSummaryTests();
  runReceiptTests();
  runLabelTests();

  console.log(`✅ Receipt tests passed (${checks} checks).`);
}

main();
