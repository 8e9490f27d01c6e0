import type { OcrToken } from "../extraction/types";

/**
 * The slice of tesseract.js `blocks` output the OCR engine reads: words
 * nested under blocks, paragraphs and lines, boxed by their corners.
 */
export interface RecognizedWord {
  text: string;
  confidence: number;
  bbox: { x0: number; y0: number; x1: number; y1: number };
}

export interface RecognizedBlock {
  paragraphs: ReadonlyArray<{ lines: ReadonlyArray<{ words: readonly RecognizedWord[] }> }>;
}

/**
 * tesseract.js reports a float in [0, 100]; anything else means no
 * confidence was produced.
 */
export function toConfidence(value: number): number {
  if (!Number.isFinite(value) || value < 0) return -1;
  return Math.min(Math.trunc(value), 100);
}

/**
 * Flatten recognized blocks into tokens in reading order. Token text is
 * kept as-is; callers decide what counts as empty.
 */
export function flattenWords(blocks: readonly RecognizedBlock[] | null | undefined): OcrToken[] {
  const tokens: OcrToken[] = [];

  for (const block of blocks ?? []) {
    for (const paragraph of block.paragraphs) {
      for (const line of paragraph.lines) {
        for (const word of line.words) {
          const { x0, y0, x1, y1 } = word.bbox;
          tokens.push({
            text: word.text,
            confidence: toConfidence(word.confidence),
            left: x0,
            top: y0,
            width: x1 - x0,
            height: y1 - y0,
          });
        }
      }
    }
  }

  return tokens;
}
