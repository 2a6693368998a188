import type { AssembledText, OcrToken } from './types';

const TOKEN_SEPARATOR = ' ';

export function assembleText(tokens: readonly OcrToken[]): AssembledText {
  let text = '';
  const offsets: Array<number | null> = [];

  tokens.forEach((token, index) => {
    if (index > 0) {
      text += TOKEN_SEPARATOR;
      offsets.push(null);
    }

    text += token.text;
    for (let position = 0; position < token.text.length; position += 1) {
      offsets.push(index);
    }
  });

  return { text, offsets };
}

export function tokenIndicesForSpan(assembled: AssembledText, start: number, end: number): number[] {
  const indices = new Set<number>();
  const upper = Math.min(end, assembled.offsets.length);

  for (let position = Math.max(0, start); position < upper; position += 1) {
    const owner = assembled.offsets[position];
    if (owner !== null && owner !== undefined) {
      indices.add(owner);
    }
  }

  return Array.from(indices).sort((left, right) => left - right);
}
