import assert from 'node:assert/strict';
import { applyPolicy, applyTemplatePolicy } from '../src/shared/redaction/policy';
import {
  MANUAL_REGION_LABEL,
  buildRegions,
  createManualRegion,
  mergeBoxes,
  parseRegionSpec
} from '../src/shared/redaction/regions';
import type { Box, DetectedItem, PiiType } from '../src/shared/types';

function item(piiType: PiiType, matchedText: string, boxes: Box[], hasQueryParams = false): DetectedItem {
  return { piiType, matchedText, boxes, hasQueryParams, span: { start: 0, end: matchedText.length } };
}

let checks = 0;

function runMergeTests(): void {
  const merged = mergeBoxes(item('email', 'bob@example.com', [
    { x: 0, y: 0, w: 10, h: 10 },
    { x: 20, y: 0, w: 10, h: 10 },
    { x: 40, y: 0, w: 30, h: 10 }
  ]));
  assert.deepEqual(merged, {
    piiType: 'email',
    label: 'bob@example.com',
    x: 0,
    y: 0,
    w: 70,
    h: 10,
    selected: true,
    manual: false
  });
  checks += 1;

  const stacked = mergeBoxes(item('phone', '555-1234', [
    { x: 10, y: 5, w: 20, h: 10 },
    { x: 0, y: 30, w: 5, h: 5 }
  ]));
  assert.deepEqual([stacked.x, stacked.y, stacked.w, stacked.h], [0, 5, 30, 30]);
  checks += 1;

  const empty = mergeBoxes(item('custom', 'Ticket', []));
  assert.deepEqual([empty.x, empty.y, empty.w, empty.h, empty.selected], [0, 0, 0, 0, true]);
  checks += 1;

  const regions = buildRegions([
    item('email', 'a@b.io', [{ x: 5, y: 5, w: 10, h: 10 }]),
    item('ip', '10.0.0.1', [{ x: 50, y: 5, w: 10, h: 10 }])
  ]);
  assert.deepEqual(regions.map((region) => [region.piiType, region.label, region.x]), [
    ['email', 'a@b.io', 5],
    ['ip', '10.0.0.1', 50]
  ]);
  assert.deepEqual(buildRegions([]), []);
  checks += 2;
}

function runManualRegionTests(): void {
  assert.deepEqual(createManualRegion(1, 2, 3, 4), {
    piiType: null,
    label: MANUAL_REGION_LABEL,
    x: 1,
    y: 2,
    w: 3,
    h: 4,
    selected: true,
    manual: true
  });
  checks += 1;

  const parsed = parseRegionSpec('10, 20,30 ,40');
  assert.deepEqual([parsed.x, parsed.y, parsed.w, parsed.h, parsed.manual], [10, 20, 30, 40, true]);
  checks += 1;

  for (const spec of ['1,2,3', '1,2,3,x', '1.5,2,3,4', '1,,3,4', '']) {
    assert.throws(() => parseRegionSpec(spec), /Invalid region/, `expected "${spec}" to be rejected`);
    checks += 1;
  }
}

function runPolicyTests(): void {
  const items = [
    item('url', 'https://a.io/reset?token=1', [{ x: 0, y: 0, w: 10, h: 10 }], true),
    item('url', 'https://a.io/docs', [{ x: 0, y: 20, w: 10, h: 10 }]),
    item('email', 'a@b.io', [{ x: 0, y: 40, w: 10, h: 10 }])
  ];

  const flagged = applyTemplatePolicy(items, { flagQueryParamsOnly: true });
  assert.deepEqual(flagged.map((region) => region.selected), [true, false, true]);
  checks += 1;

  const all = applyTemplatePolicy(items, { flagQueryParamsOnly: false });
  assert.deepEqual(all.map((region) => region.selected), [true, true, true]);
  checks += 1;

  const regions = buildRegions(items);
  const email = regions[2];
  assert(email);
  email.selected = false;
  const returned = applyPolicy(items, regions, { flagQueryParamsOnly: true });
  assert.equal(returned, regions, 'policy updates regions in place');
  assert.equal(regions.length, 3);
  assert.equal(email.selected, false, 'non-URL regions keep their flag');
  checks += 3;

  // Only the shared prefix of mismatched lists is touched.
  const short = buildRegions(items.slice(0, 1));
  applyPolicy(items, short, { flagQueryParamsOnly: true });
  assert.deepEqual(short.map((region) => region.selected), [true]);
  checks += 1;
}

function main(): void {
  runMergeTests();
  runManualRegionTests();
  runPolicyTests();

  console.log(`✅ Region and policy tests passed (${checks} checks).`);
}

main();
