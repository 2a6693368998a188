import path from 'node:path';
import { DEFAULT_OCR_CONFIDENCE, OCR_TIMEOUT_MS, withTimeout } from '../file/security';
import { log } from '../log';
import type { OcrToken, OcrWord } from './types';

export interface OcrExtraction {
  tokens: OcrToken[];
  discardedWords: number;
  averageConfidence: number;
}

export interface OcrOptions {
  minConfidence?: number;
  /** Directory holding eng.traineddata.gz; defaults to the bundled @tesseract.js-data/eng copy. */
  langPath?: string;
  timeoutMs?: number;
}

interface OcrRuntime {
  recognize: (image: Buffer | string) => Promise<OcrWord[]>;
  dispose: () => Promise<void>;
}

let tesseractPromise: Promise<typeof import('tesseract.js')> | null = null;

async function loadTesseract(): Promise<typeof import('tesseract.js')> {
  if (!tesseractPromise) {
    tesseractPromise = import('tesseract.js');
  }
  return tesseractPromise;
}

const OCR_LANG_DATA_VARIANT = '4.0.0_best_int';

export function getLocalOcrLangPath(): string {
  const packageRoot = path.dirname(require.resolve('@tesseract.js-data/eng/package.json'));
  return path.join(packageRoot, OCR_LANG_DATA_VARIANT);
}

async function createOcrRuntime(langPath: string = getLocalOcrLangPath()): Promise<OcrRuntime> {
  const tesseract = await loadTesseract();
  const worker = await tesseract.createWorker('eng', 1, {
    langPath,
    gzip: true,
    cacheMethod: 'none',
    logger: () => {}
  });

  return {
    recognize: async (image) => {
      const result = await worker.recognize(image);
      return result.data.words;
    },
    dispose: async () => {
      await worker.terminate();
    }
  };
}

export function normalizeTokenText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function wordsToTokens(words: readonly OcrWord[], minConfidence: number = DEFAULT_OCR_CONFIDENCE): OcrExtraction {
  const tokens: OcrToken[] = [];
  let discardedWords = 0;
  let confidenceSum = 0;
  let confidenceCount = 0;

  for (const word of words) {
    const text = normalizeTokenText(word.text ?? '');
    if (!text) {
      continue;
    }

    const confidence = Number(word.confidence ?? Number.NaN);
    const hasConfidence = Number.isFinite(confidence) && confidence >= 0;
    if (hasConfidence && confidence > 0) {
      confidenceSum += confidence;
      confidenceCount += 1;
    }

    if (!hasConfidence || confidence < minConfidence || !word.bbox) {
      discardedWords += 1;
      continue;
    }

    const x = Math.max(0, Math.round(word.bbox.x0));
    const y = Math.max(0, Math.round(word.bbox.y0));

    tokens.push({
      text,
      x,
      y,
      w: Math.max(0, Math.round(word.bbox.x1) - x),
      h: Math.max(0, Math.round(word.bbox.y1) - y),
      confidence: Math.min(100, Math.round(confidence))
    });
  }

  return {
    tokens,
    discardedWords,
    averageConfidence: confidenceCount > 0 ? confidenceSum / confidenceCount : 0
  };
}

export async function runOcr(image: Buffer | string, options: OcrOptions = {}): Promise<OcrExtraction> {
  const minConfidence = options.minConfidence ?? DEFAULT_OCR_CONFIDENCE;
  const ocr = await createOcrRuntime(options.langPath);

  try {
    const words = await withTimeout(ocr.recognize(image), options.timeoutMs ?? OCR_TIMEOUT_MS, 'OCR');
    const extraction = wordsToTokens(words, minConfidence);
    log('debug', 'OCR finished.', {
      words: words.length,
      tokens: extraction.tokens.length,
      discardedWords: extraction.discardedWords,
      averageConfidence: extraction.averageConfidence
    });
    return extraction;
  } finally {
    await ocr.dispose();
  }
}
