import assert from 'node:assert/strict';
import { assembleText, tokenIndicesForSpan } from '../src/shared/ocr/assembler';
import type { OcrToken } from '../src/shared/ocr/types';

function token(text: string, x = 0): OcrToken {
  return { text, x, y: 0, w: text.length * 10, h: 10, confidence: 90 };
}

let checks = 0;

function runAssemblyTests(): void {
  const assembled = assembleText([token('Email:'), token('bob@example.com', 70)]);
  assert.equal(assembled.text, 'Email: bob@example.com');
  assert.equal(assembled.offsets.length, assembled.text.length);
  assert.deepEqual(assembled.offsets.slice(0, 6), [0, 0, 0, 0, 0, 0]);
  assert.equal(assembled.offsets[6], null);
  assert.equal(assembled.offsets[7], 1);
  assert.equal(assembled.offsets[21], 1);
  checks += 5;

  const single = assembleText([token('abc')]);
  assert.equal(single.text, 'abc');
  assert.deepEqual(single.offsets, [0, 0, 0]);
  checks += 2;

  const empty = assembleText([]);
  assert.equal(empty.text, '');
  assert.deepEqual(empty.offsets, []);
  checks += 2;

  const samples = [['a'], ['a', 'bb'], ['one', 'two', 'three'], ['x', 'y', 'z', 'w']];
  for (const texts of samples) {
    const result = assembleText(texts.map((text) => token(text)));
    const expectedLength = texts.reduce((sum, text) => sum + text.length, 0) + texts.length - 1;
    assert.equal(result.text.length, expectedLength, `length mismatch for [${texts.join(', ')}]`);
    assert.equal(result.offsets.length, result.text.length);
    assert.equal(result.offsets.filter((owner) => owner === null).length, texts.length - 1);
    checks += 3;
  }
}

function runSpanTests(): void {
  const assembled = assembleText([token('Call:'), token('(555)'), token('123-4567')]);

  assert.deepEqual(tokenIndicesForSpan(assembled, 6, 20), [1, 2]);
  assert.deepEqual(tokenIndicesForSpan(assembled, 0, 5), [0]);
  // The separator alone belongs to no token.
  assert.deepEqual(tokenIndicesForSpan(assembled, 5, 6), []);
  assert.deepEqual(tokenIndicesForSpan(assembled, 4, 7), [0, 1]);
  assert.deepEqual(tokenIndicesForSpan(assembled, 18, 99), [2]);
  assert.deepEqual(tokenIndicesForSpan(assembled, 3, 3), []);
  checks += 6;
}

function main(): void {
  runAssemblyTests();
  runSpanTests();

  console.log(`✅ Text assembler tests passed (${checks} checks).`);
}

main();
