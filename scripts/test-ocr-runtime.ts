import assert from 'node:assert/strict';
import { stat } from 'node:fs/promises';
import path from 'node:path';
import { readRuntimeConfig } from '../src/shared/config';
import { OCR_TIMEOUT_MS, withTimeout } from '../src/shared/file/security';
import { parseLogLevel } from '../src/shared/log';
import { getLocalOcrLangPath, normalizeTokenText, wordsToTokens } from '../src/shared/ocr/tesseract';
import type { OcrWord } from '../src/shared/ocr/types';

let checks = 0;

function runTokenTests(): void {
  const words: OcrWord[] = [
    { text: ' Email: ', confidence: 95.6, bbox: { x0: 10.4, y0: 5, x1: 60.6, y1: 20 } },
    { text: '', confidence: 99, bbox: { x0: 0, y0: 0, x1: 1, y1: 1 } },
    { text: 'noise', confidence: 30, bbox: { x0: 0, y0: 0, x1: 10, y1: 10 } },
    { text: 'bob@example.com', confidence: 88, bbox: { x0: 70, y0: 5, x1: 220, y1: 20 } },
    { text: 'x', confidence: -1, bbox: { x0: 0, y0: 0, x1: 5, y1: 5 } },
    { text: 'nobox', confidence: 90 }
  ];

  const extraction = wordsToTokens(words, 60);
  assert.deepEqual(extraction.tokens, [
    { text: 'Email:', x: 10, y: 5, w: 51, h: 15, confidence: 96 },
    { text: 'bob@example.com', x: 70, y: 5, w: 150, h: 15, confidence: 88 }
  ]);
  assert.equal(extraction.discardedWords, 3);
  assert(Math.abs(extraction.averageConfidence - 75.9) < 1e-9, `average was ${extraction.averageConfidence}`);
  checks += 3;

  const threshold = wordsToTokens([
    { text: 'low', confidence: 59.5, bbox: { x0: 0, y0: 0, x1: 10, y1: 10 } },
    { text: 'edge', confidence: 60, bbox: { x0: -3, y0: 0, x1: 10, y1: 10 } }
  ]);
  assert.deepEqual(threshold.tokens.map((token) => [token.text, token.x, token.w]), [['edge', 0, 10]]);
  assert.equal(threshold.discardedWords, 1);
  checks += 2;

  assert.deepEqual(wordsToTokens([]), { tokens: [], discardedWords: 0, averageConfidence: 0 });
  checks += 1;

  assert.equal(normalizeTokenText('  a \n b\t'), 'a b');
  assert.equal(normalizeTokenText('\n'), '');
  checks += 2;
}

async function runOfflineAssetTests(): Promise<void> {
  const langPath = getLocalOcrLangPath();
  assert.equal(path.basename(langPath), '4.0.0_best_int');

  const info = await stat(path.join(langPath, 'eng.traineddata.gz'));
  assert(info.isFile(), `Expected bundled language data in ${langPath}`);
  assert(info.size > 0, 'Bundled language data is empty');
  checks += 3;
}

async function runTimeoutTests(): Promise<void> {
  const fast = await withTimeout(Promise.resolve('done'), 50, 'Fast task');
  assert.equal(fast, 'done');
  checks += 1;

  const never = new Promise<string>(() => undefined);
  await assert.rejects(withTimeout(never, 20, 'OCR'), /OCR timed out after 20ms\./);
  checks += 1;
}

function runConfigTests(): void {
  assert.deepEqual(readRuntimeConfig({}), {
    logLevel: 'info',
    ocrLangPath: undefined,
    ocrTimeoutMs: OCR_TIMEOUT_MS
  });
  checks += 1;

  assert.deepEqual(readRuntimeConfig({
    SHOTVEIL_LOG_LEVEL: 'off',
    SHOTVEIL_OCR_LANG_PATH: ' /opt/tessdata ',
    SHOTVEIL_OCR_TIMEOUT_MS: '5000'
  }), {
    logLevel: 'silent',
    ocrLangPath: '/opt/tessdata',
    ocrTimeoutMs: 5000
  });
  checks += 1;

  assert.throws(() => readRuntimeConfig({ SHOTVEIL_OCR_TIMEOUT_MS: 'soon' }), /SHOTVEIL_OCR_TIMEOUT_MS must be a positive integer, received "soon"/);
  assert.throws(() => readRuntimeConfig({ SHOTVEIL_OCR_TIMEOUT_MS: '-5' }), /positive integer/);
  checks += 2;

  assert.equal(parseLogLevel('WARNING'), 'warn');
  assert.equal(parseLogLevel('debug'), 'debug');
  assert.equal(parseLogLevel('none'), 'silent');
  assert.equal(parseLogLevel('chatty'), 'info');
  assert.equal(parseLogLevel(undefined), 'info');
  checks += 5;
}

async function main(): Promise<void> {
  runTokenTests();
  await runOfflineAssetTests();
  await runTimeoutTests();
  runConfigTests();

  console.log(`✅ OCR runtime tests passed (${checks} checks).`);
}

void main();
