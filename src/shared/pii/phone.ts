import { log } from '../log';
import type { AssembledText, OcrToken } from '../ocr/types';
import type { DetectedItem } from '../types';
import { scanPattern, toDetectedItem, type PatternMatch } from './matching';
import { PHONE_REGION_HINTS, phoneGrammarFor, type PhoneRegionHint } from './patterns';
import { isPlausiblePhone } from './validators';

export type PhoneScanResult =
  | { ok: true; hint: PhoneRegionHint | null; matches: PatternMatch[] }
  | { ok: false; hint: PhoneRegionHint | null; error: string };

export function scanPhoneRegion(text: string, hint: PhoneRegionHint | null): PhoneScanResult {
  try {
    const grammar = phoneGrammarFor(hint);
    const matches = scanPattern(text, grammar.regex, (value) => isPlausiblePhone(value, grammar.minDigits, grammar.maxDigits));
    return { ok: true, hint, matches };
  } catch (error) {
    return { ok: false, hint, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * One scan per region hint. The same number written twice at different places
 * stays two detections; only identical text at identical offsets collapses.
 */
export function detectPhoneNumbers(
  assembled: AssembledText,
  tokens: readonly OcrToken[],
  hints: ReadonlyArray<PhoneRegionHint | null> = PHONE_REGION_HINTS
): DetectedItem[] {
  const seen = new Set<string>();
  const items: DetectedItem[] = [];

  for (const hint of hints) {
    const result = scanPhoneRegion(assembled.text, hint);
    if (!result.ok) {
      log('debug', `Phone scan for region ${hint ?? 'none'} failed.`, result.error);
      continue;
    }

    for (const match of result.matches) {
      const key = `${match.value}|${match.start}|${match.end}`;
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);

      const item = toDetectedItem('phone', match, assembled, tokens);
      if (item) {
        items.push(item);
      }
    }
  }

  return items;
}
