/**
 * Extraction core
 *
 * Architecture:
 * - types.ts: Collaborator contracts (parser, rasterizer, OCR engine) and the adapter interface
 * - coordinates.ts: Point/pixel conversion shared by every pipeline
 * - structural.ts: Text-layer pipeline
 * - ocr.ts: Rasterize + OCR pipeline
 * - registry.ts: Pipeline registration and availability probing
 * - orchestrator.ts: Pipeline selection, isolated execution, summary
 * - errors.ts: Error taxonomy
 *
 * The libraries behind the contracts live in ../engines.
 */

export type {
  Availability,
  AdapterOptions,
  DocumentHandle,
  OcrEngine,
  OcrPageResult,
  OcrSession,
  OcrToken,
  PageRange,
  ParsedWord,
  PipelineAdapter,
  RasterImage,
  Rasterizer,
  RawTable,
  StructuralDocument,
  StructuralPage,
  StructuralParser,
} from "./types";

export { POINTS_PER_INCH, convert, pointBoxToPixels, pointScale, rescale, rescaleBox, scale, toPixels } from "./coordinates";
export { StructuralAdapter } from "./structural";
export { OcrAdapter, type OcrAdapterOptions } from "./ocr";
export { PipelineRegistry } from "./registry";
export { runExtraction, selectPipelines, buildSummary, SUMMARY_PAGE_CHARS, type ExtractionOptions } from "./orchestrator";
export {
  ExtractionError,
  InvalidRequestError,
  DocumentNotFoundError,
  DependencyUnavailableError,
  PipelineExecutionError,
  isAbortError,
} from "./errors";
