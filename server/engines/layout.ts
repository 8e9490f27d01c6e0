/**
 * Word, line and table reconstruction from positioned text runs.
 *
 * All values are in PDF points with the origin at the top-left corner of
 * the page.
 */

import type { ParsedWord, RawTable } from "../extraction/types";

/**
 * A run of text drawn with one transform, as reported by pdfjs.
 */
export interface TextRun {
  text: string;
  x: number;
  baseline: number;
  width: number;
  height: number;
}

export const TABLE_CELL_GAP = 12;
export const TABLE_MIN_ROWS = 2;
const BASELINE_TOLERANCE = 2;

/**
 * Split a run on whitespace. Each character is assumed to take an equal
 * share of the run's width.
 */
export function splitRunIntoWords(run: TextRun): ParsedWord[] {
  const chars = Array.from(run.text);
  if (chars.length === 0) return [];

  const charWidth = run.width / chars.length;
  const top = run.baseline - run.height;
  const words: ParsedWord[] = [];
  let start = -1;

  for (let i = 0; i <= chars.length; i++) {
    const isSpace = i === chars.length || /\s/.test(chars[i]);
    if (!isSpace && start === -1) {
      start = i;
    } else if (isSpace && start !== -1) {
      words.push({
        text: chars.slice(start, i).join(""),
        x0: run.x + start * charWidth,
        top,
        x1: run.x + i * charWidth,
        bottom: run.baseline,
      });
      start = -1;
    }
  }

  return words;
}

/**
 * Group words sharing a baseline (within a small tolerance) into lines,
 * top to bottom, each line ordered left to right.
 */
export function groupIntoLines(words: readonly ParsedWord[]): ParsedWord[][] {
  const sorted = [...words].sort((left, right) => left.bottom - right.bottom || left.x0 - right.x0);
  const lines: ParsedWord[][] = [];
  let current: ParsedWord[] = [];
  let lineBaseline = 0;

  for (const word of sorted) {
    if (current.length > 0 && Math.abs(word.bottom - lineBaseline) > BASELINE_TOLERANCE) {
      lines.push(current);
      current = [];
    }
    if (current.length === 0) {
      lineBaseline = word.bottom;
    }
    current.push(word);
  }
  if (current.length > 0) {
    lines.push(current);
  }

  return lines.map((line) => line.sort((left, right) => left.x0 - right.x0));
}

export function buildPageText(lines: readonly ParsedWord[][]): string {
  return lines.map((line) => line.map((word) => word.text).join(" ")).join("\n");
}

/**
 * Split a line into cells wherever the horizontal gap between neighbouring
 * words exceeds `minGap`.
 */
export function splitIntoCells(line: readonly ParsedWord[], minGap = TABLE_CELL_GAP): string[] {
  const cells: string[][] = [];
  let previous: ParsedWord | undefined;

  for (const word of line) {
    if (!previous || word.x0 - previous.x1 > minGap) {
      cells.push([word.text]);
    } else {
      cells[cells.length - 1].push(word.text);
    }
    previous = word;
  }

  return cells.map((cell) => cell.join(" "));
}

/**
 * A table is a block of consecutive lines that all split into the same
 * number (two or more) of cells, at least `minRows` lines long.
 */
export function detectTables(
  lines: readonly ParsedWord[][],
  options: { minGap?: number; minRows?: number } = {}
): RawTable[] {
  const { minGap = TABLE_CELL_GAP, minRows = TABLE_MIN_ROWS } = options;
  const tables: RawTable[] = [];
  let block: string[][] = [];

  const flush = () => {
    if (block.length >= minRows) {
      tables.push(block);
    }
    block = [];
  };

  for (const line of lines) {
    const cells = splitIntoCells(line, minGap);
    if (cells.length < 2) {
      flush();
      continue;
    }
    if (block.length > 0 && block[0].length !== cells.length) {
      flush();
    }
    block.push(cells);
  }
  flush();

  return tables;
}
