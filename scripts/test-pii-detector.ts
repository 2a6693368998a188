import assert from 'node:assert/strict';
import { assembleText } from '../src/shared/ocr/assembler';
import type { OcrToken } from '../src/shared/ocr/types';
import {
  compileCustomRule,
  detectDomains,
  detectFaces,
  detectPii,
  domainExclusionSpans
} from '../src/shared/pii/detector';
import { detectPhoneNumbers, scanPhoneRegion } from '../src/shared/pii/phone';
import type { DetectedItem, DetectionPolicy, PiiType } from '../src/shared/types';

process.env.SHOTVEIL_LOG_LEVEL = 'silent';

function token(text: string, x: number, y = 0): OcrToken {
  return { text, x, y, w: text.length * 10, h: 10, confidence: 90 };
}

function line(...texts: string[]): OcrToken[] {
  let x = 0;
  return texts.map((text) => {
    const next = token(text, x);
    x += next.w + 10;
    return next;
  });
}

function ofType(items: DetectedItem[], type: PiiType): DetectedItem[] {
  return items.filter((item) => item.piiType === type);
}

function policy(overrides: Partial<DetectionPolicy> = {}): DetectionPolicy {
  return { ignore: { emails: [], domains: [] }, customRules: [], ...overrides };
}

let checks = 0;

function runEmailTests(): void {
  const items = detectPii(line('Email:', 'bob@example.com'));
  assert.deepEqual(items, [
    {
      piiType: 'email',
      matchedText: 'bob@example.com',
      boxes: [{ x: 70, y: 0, w: 150, h: 10 }],
      hasQueryParams: false,
      span: { start: 7, end: 22 }
    }
  ]);
  checks += 1;

  const ignored = detectPii(line('Email:', 'bob@example.com'), policy({ ignore: { emails: ['bob@example.com'], domains: [] } }));
  assert.deepEqual(ignored, [], 'an ignored email must not come back as its domain');
  checks += 1;

  const byDomain = detectPii(
    line('alice@example.com', 'carol@other.org'),
    policy({ ignore: { emails: [], domains: ['example.com'] } })
  );
  assert.deepEqual(byDomain.map((item) => [item.piiType, item.matchedText]), [['email', 'carol@other.org']]);
  checks += 1;
}

function runIpTests(): void {
  const items = detectPii(line('Server', 'IP:', '192.168.1.1'));
  assert.deepEqual(items, [
    {
      piiType: 'ip',
      matchedText: '192.168.1.1',
      boxes: [{ x: 110, y: 0, w: 110, h: 10 }],
      hasQueryParams: false,
      span: { start: 11, end: 22 }
    }
  ]);
  checks += 1;

  assert.equal(ofType(detectPii(line('IP:', '192.168.1.256')), 'ip').length, 0);
  assert.equal(ofType(detectPii(line('IP:', '999.999.999.999')), 'ip').length, 0);
  assert.equal(ofType(detectPii(line('version', '1.2.3.4.5')), 'ip').length, 0);
  checks += 3;

  const padded = detectPii(line('IP:', '010.001.002.003'));
  assert.deepEqual(padded.map((item) => [item.piiType, item.matchedText]), [['ip', '010.001.002.003']]);
  checks += 1;

  // The hostname regex reaches into the address; any shared character drops it.
  const mixed = detectPii(line('host', '10.0.0.1.example.com'));
  assert.deepEqual(mixed.map((item) => [item.piiType, item.matchedText]), [['ip', '10.0.0.1']]);
  checks += 1;
}

function runUrlAndDomainTests(): void {
  const withQuery = detectPii(line('Visit:', 'https://example.com?key=secret'));
  assert.equal(withQuery.length, 1);
  assert.equal(withQuery[0]?.piiType, 'url');
  assert.equal(withQuery[0]?.matchedText, 'https://example.com?key=secret');
  assert.equal(withQuery[0]?.hasQueryParams, true);
  checks += 4;

  const plain = detectPii(line('Visit:', 'https://example.com/docs'));
  assert.deepEqual(plain.map((item) => [item.piiType, item.hasQueryParams]), [['url', false]]);
  checks += 1;

  const www = detectPii(line('see', 'www.example.org/path'));
  assert.deepEqual(www.map((item) => [item.piiType, item.matchedText]), [['url', 'www.example.org/path']]);
  checks += 1;

  const standalone = detectPii(line('Domain:', 'example.com'));
  assert.deepEqual(standalone.map((item) => [item.piiType, item.matchedText, item.boxes]), [
    ['domain', 'example.com', [{ x: 80, y: 0, w: 110, h: 10 }]]
  ]);
  checks += 1;

  const ignoredDomain = detectPii(line('Domain:', 'example.com'), policy({ ignore: { emails: [], domains: ['example.com'] } }));
  assert.deepEqual(ignoredDomain, []);
  checks += 1;

  const tokens = line('example.com');
  const assembled = assembleText(tokens);
  assert.equal(detectDomains(assembled, tokens, [], { emails: [], domains: [] }).length, 1);
  assert.equal(detectDomains(assembled, tokens, [{ start: 3, end: 5 }], { emails: [], domains: [] }).length, 0);
  checks += 2;

  const spans = domainExclusionSpans(assembleText(line('bob@example.com', 'https://a.io', '10.0.0.1')));
  assert.deepEqual(spans, [
    { start: 0, end: 15 },
    { start: 16, end: 28 },
    { start: 29, end: 37 }
  ]);
  checks += 1;
}

function runPhoneTests(): void {
  const tokens = [
    token('First:', 0, 0),
    token('555-123-4567', 70, 0),
    token('Second:', 0, 20),
    token('555-123-4567', 80, 20)
  ];
  const phones = ofType(detectPii(tokens), 'phone');
  assert.equal(phones.length, 2, 'the same number at two places stays two detections');
  assert.deepEqual(phones.map((item) => item.boxes), [
    [{ x: 70, y: 0, w: 120, h: 10 }],
    [{ x: 80, y: 20, w: 120, h: 10 }]
  ]);
  assert.deepEqual(phones.map((item) => item.span), [
    { start: 7, end: 19 },
    { start: 28, end: 40 }
  ]);
  checks += 3;

  const split = ofType(detectPii(line('Call:', '(555)', '123-4567')), 'phone');
  assert.equal(split.length, 1);
  assert.equal(split[0]?.matchedText, '(555) 123-4567');
  assert.deepEqual(split[0]?.boxes, [
    { x: 60, y: 0, w: 50, h: 10 },
    { x: 120, y: 0, w: 80, h: 10 }
  ]);
  checks += 3;

  const unseparated = detectPii(line('Call:', '2025550143'));
  assert.deepEqual(unseparated.map((item) => [item.piiType, item.matchedText, item.span]), [
    ['phone', '2025550143', { start: 6, end: 16 }]
  ]);
  const caOnly = scanPhoneRegion('Call: 2025550143', 'CA');
  assert.deepEqual(caOnly.ok ? caOnly.matches.map((match) => match.value) : [], ['2025550143']);
  checks += 2;

  const local = ofType(detectPii(line('Phone:', '555-1234')), 'phone');
  assert.deepEqual(local.map((item) => item.matchedText), ['555-1234']);
  checks += 1;

  const international = detectPii(line('Tel:', '+44', '20', '7946', '0958'));
  assert.deepEqual(international.map((item) => [item.piiType, item.matchedText]), [['phone', '+44 20 7946 0958']]);
  assert.equal(international[0]?.boxes.length, 4);
  checks += 2;

  const assembled = assembleText(line('Phone:', '555-1234'));
  assert.equal(detectPhoneNumbers(assembled, line('Phone:', '555-1234'), ['CA']).length, 0);
  checks += 1;

  const scan = scanPhoneRegion('Call 555-123-4567', 'US');
  assert.equal(scan.ok, true);
  assert.deepEqual(scan.ok ? scan.matches : [], [{ value: '555-123-4567', start: 5, end: 17 }]);
  checks += 2;
}

function runCustomRuleTests(): void {
  const rules = [
    { name: 'Ticket', pattern: 'TICKET-\\d+' },
    { name: 'Broken', pattern: '([unclosed' }
  ];
  const items = detectPii(line('Ref', 'TICKET-4821'), policy({ customRules: rules }));
  assert.deepEqual(items, [
    {
      piiType: 'custom',
      matchedText: 'Ticket',
      boxes: [{ x: 40, y: 0, w: 110, h: 10 }],
      hasQueryParams: false,
      span: { start: 4, end: 15 }
    }
  ]);
  checks += 1;

  assert.equal(compileCustomRule({ name: 'Broken', pattern: '([unclosed' }).ok, false);
  assert.equal(compileCustomRule({ name: 'Ok', pattern: '\\d+' }).ok, true);
  checks += 2;

  const zeroLength = detectPii(line('abc'), policy({ customRules: [{ name: 'Empty', pattern: 'x*' }] }));
  assert.deepEqual(zeroLength, []);
  checks += 1;

  // Boxes follow token order, not geometry.
  const reversed = [token('alpha', 200), token('beta', 0)];
  const spanning = detectPii(reversed, policy({ customRules: [{ name: 'Pair', pattern: 'alpha beta' }] }));
  assert.deepEqual(spanning[0]?.boxes, [
    { x: 200, y: 0, w: 50, h: 10 },
    { x: 0, y: 0, w: 40, h: 10 }
  ]);
  checks += 1;
}

function runMixedTests(): void {
  const items = detectPii(line('Contact:', 'admin@server.com', 'IP:', '10.0.0.1', 'Phone:', '555-1234'));
  assert.deepEqual(items.map((item) => item.piiType), ['email', 'ip', 'phone']);
  checks += 1;

  assert.deepEqual(detectPii([]), []);
  assert.deepEqual(detectPii(line('Hello', 'world')), []);
  assert.deepEqual(detectFaces(), []);
  checks += 3;
}

function main(): void {
  runEmailTests();
  runIpTests();
  runUrlAndDomainTests();
  runPhoneTests();
  runCustomRuleTests();
  runMixedTests();

  console.log(`✅ Detector tests passed (${checks} checks).`);
}

main();
