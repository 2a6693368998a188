import { tokenIndicesForSpan } from '../ocr/assembler';
import type { AssembledText, OcrToken } from '../ocr/types';
import type { Box, DetectedItem, PiiType, TextSpan } from '../types';

export interface PatternMatch extends TextSpan {
  value: string;
}

export function scanPattern(text: string, regex: RegExp, validate?: (match: string) => boolean): PatternMatch[] {
  const scanner = new RegExp(regex.source, regex.flags.includes('g') ? regex.flags : `${regex.flags}g`);
  const matches: PatternMatch[] = [];
  let match: RegExpExecArray | null;

  while ((match = scanner.exec(text)) !== null) {
    const value = match[0];
    if (value.length === 0) {
      scanner.lastIndex += 1;
      continue;
    }

    if (validate && !validate(value)) {
      continue;
    }

    matches.push({ value, start: match.index, end: match.index + value.length });
  }

  return matches;
}

export function resolveBoxes(assembled: AssembledText, tokens: readonly OcrToken[], start: number, end: number): Box[] {
  const boxes: Box[] = [];
  for (const index of tokenIndicesForSpan(assembled, start, end)) {
    const token = tokens[index];
    if (!token) {
      continue;
    }
    boxes.push({ x: token.x, y: token.y, w: token.w, h: token.h });
  }
  return boxes;
}

export function toDetectedItem(
  piiType: PiiType,
  match: PatternMatch,
  assembled: AssembledText,
  tokens: readonly OcrToken[],
  matchedText: string = match.value
): DetectedItem | null {
  const boxes = resolveBoxes(assembled, tokens, match.start, match.end);
  if (boxes.length === 0) {
    return null;
  }

  return {
    piiType,
    matchedText,
    boxes,
    hasQueryParams: piiType === 'url' && match.value.includes('?'),
    span: { start: match.start, end: match.end }
  };
}
