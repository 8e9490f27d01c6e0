/**
 * Contracts between the extraction core and the libraries that do the
 * actual parsing, rendering and recognition.
 */

import type { PageResult, PipelineId } from "@shared/schema";

/**
 * An uploaded document. Adapters must copy `data` before handing it to a
 * library that may take ownership of the buffer.
 */
export interface DocumentHandle {
  id: string;
  data: Uint8Array;
}

/**
 * A word as reported by a structural parser, in point space with the
 * origin at the top-left corner of the page.
 */
export interface ParsedWord {
  text: string;
  x0: number;
  top: number;
  x1: number;
  bottom: number;
}

/**
 * Raw table grid. `null` marks a cell the parser found but could not read.
 */
export type RawTable = Array<Array<string | null>>;

export interface StructuralPage {
  readonly widthPts: number;
  readonly heightPts: number;
  extractText(): Promise<string | null>;
  extractWords(): Promise<ParsedWord[]>;
  extractTables(): Promise<RawTable[]>;
}

export interface StructuralDocument {
  readonly pageCount: number;
  getPage(index: number): Promise<StructuralPage>;
  close(): Promise<void>;
}

export interface StructuralParser {
  readonly name: string;
  /** Resolves when the backing library can be loaded. */
  ensureAvailable(): Promise<void>;
  open(data: Uint8Array): Promise<StructuralDocument>;
}

/**
 * Zero-based, inclusive.
 */
export interface PageRange {
  first: number;
  last: number;
}

export interface RasterImage {
  pageIndex: number;
  width: number;
  height: number;
  dpi: number;
  widthPts?: number;
  heightPts?: number;
  png: Buffer;
}

export interface Rasterizer {
  readonly name: string;
  ensureAvailable(): Promise<void>;
  /**
   * Render pages at `dpi`. Pages outside the document are skipped, so a
   * range past the last page yields an empty array.
   */
  render(data: Uint8Array, dpi: number, range?: PageRange): Promise<RasterImage[]>;
}

/**
 * One recognized token, box in the recognized image's pixel space.
 */
export interface OcrToken {
  text: string;
  confidence: number;
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface OcrPageResult {
  tokens: OcrToken[];
  fullText: string;
}

export interface OcrSession {
  recognize(image: RasterImage): Promise<OcrPageResult>;
  close(): Promise<void>;
}

export interface OcrEngine {
  readonly name: string;
  ensureAvailable(): Promise<void>;
  open(): Promise<OcrSession>;
}

export interface AdapterOptions {
  /** Resolution of the preview images every box is mapped into. */
  dpi: number;
  signal?: AbortSignal;
}

/**
 * One extraction pipeline. Every adapter produces the same page shape, so
 * adding a pipeline means implementing this interface.
 */
export interface PipelineAdapter {
  readonly id: PipelineId;
  readonly description: string;
  ensureAvailable(): Promise<void>;
  extract(document: DocumentHandle, options: AdapterOptions): Promise<PageResult[]>;
}

export type Availability =
  | { available: true }
  | { available: false; reason: string };
