export interface OcrToken {
  readonly text: string;
  readonly x: number;
  readonly y: number;
  readonly w: number;
  readonly h: number;
  /** 0-100, as reported by the OCR engine. */
  readonly confidence: number;
}

export interface AssembledText {
  text: string;
  /** Owning token index per character; null on inserted separators. */
  offsets: Array<number | null>;
}

export interface OcrWordBbox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface OcrWord {
  text?: string;
  confidence?: number;
  bbox?: OcrWordBbox;
}
