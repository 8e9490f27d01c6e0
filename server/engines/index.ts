/**
 * Concrete collaborators behind the extraction contracts:
 * - pdfjs-parser.ts: text layer, words and tables via pdfjs-dist
 * - pdfjs-rasterizer.ts: page rendering via pdfjs-dist + @napi-rs/canvas
 * - tesseract-engine.ts: OCR via tesseract.js
 * - layout.ts / tesseract-words.ts: pure helpers the engines build on
 * - loaders.ts / polyfills.ts: lazy imports and Node globals
 */

import { OcrAdapter, PipelineRegistry, StructuralAdapter } from "../extraction";
import { PdfjsParser } from "./pdfjs-parser";
import { PdfjsRasterizer } from "./pdfjs-rasterizer";
import { TesseractEngine, type TesseractEngineOptions } from "./tesseract-engine";

export { PdfjsParser } from "./pdfjs-parser";
export { PdfjsRasterizer } from "./pdfjs-rasterizer";
export { TesseractEngine, type TesseractEngineOptions } from "./tesseract-engine";

export interface EngineOptions {
  ocrDpi?: number;
  tesseract: TesseractEngineOptions;
}

/**
 * Registry with both pipelines wired to the bundled engines, plus the
 * rasterizer so previews render exactly like OCR input.
 */
export function createDefaultRegistry(options: EngineOptions): { registry: PipelineRegistry; rasterizer: PdfjsRasterizer } {
  const rasterizer = new PdfjsRasterizer();
  const registry = new PipelineRegistry()
    .register(new StructuralAdapter(new PdfjsParser()))
    .register(new OcrAdapter(rasterizer, new TesseractEngine(options.tesseract), { ocrDpi: options.ocrDpi }));

  return { registry, rasterizer };
}
