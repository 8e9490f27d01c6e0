/**
 * OCR extraction: rasterizes every page and recognizes words on the image.
 *
 * Pages are rendered at the OCR resolution (the preview resolution unless
 * configured otherwise) and every box is mapped into preview pixels, so an
 * OCR word lines up with the preview image exactly like a text-layer word.
 */

import type { PageGeometry, PageResult, WordBox } from "@shared/schema";
import type {
  AdapterOptions,
  DocumentHandle,
  OcrEngine,
  OcrSession,
  OcrToken,
  PipelineAdapter,
  RasterImage,
  Rasterizer,
} from "./types";
import { rescale, rescaleBox, toPixels } from "./coordinates";
import { checkAborted, getErrorMessage } from "./errors";
import { createLogger } from "../logger";

const log = createLogger("ocr");

export interface OcrAdapterOptions {
  /** Render resolution for recognition. Defaults to the preview resolution. */
  ocrDpi?: number;
}

export class OcrAdapter implements PipelineAdapter {
  readonly id = "ocr" as const;
  readonly description: string;

  constructor(
    private readonly rasterizer: Rasterizer,
    private readonly engine: OcrEngine,
    private readonly options: OcrAdapterOptions = {}
  ) {
    this.description = `OCR via ${engine.name} on pages rendered by ${rasterizer.name}`;
  }

  async ensureAvailable(): Promise<void> {
    await this.rasterizer.ensureAvailable();
    await this.engine.ensureAvailable();
  }

  async extract(document: DocumentHandle, { dpi, signal }: AdapterOptions): Promise<PageResult[]> {
    checkAborted(signal);
    const ocrDpi = this.options.ocrDpi ?? dpi;

    // Not isolated: a document that cannot be rendered fails the pipeline.
    const images = await this.rasterizer.render(new Uint8Array(document.data), ocrDpi);
    checkAborted(signal);

    log.debug("Rendered pages for OCR", { document: document.id, pages: images.length, ocrDpi });

    const session = await this.engine.open();
    const pages: PageResult[] = [];

    try {
      for (const image of images) {
        checkAborted(signal);
        pages.push(await this.recognizePage(session, image, dpi, document.id));
      }
    } finally {
      await session.close();
    }

    return pages;
  }

  private async recognizePage(
    session: OcrSession,
    image: RasterImage,
    dpi: number,
    documentId: string
  ): Promise<PageResult> {
    const geometry = previewGeometry(image, dpi);

    try {
      const { tokens, fullText } = await session.recognize(image);
      return {
        geometry,
        text: fullText,
        words: tokensToWords(tokens, image.dpi, dpi),
        tables: [],
      };
    } catch (error) {
      log.warn("OCR failed for page", {
        document: documentId,
        page: image.pageIndex,
        error: getErrorMessage(error, "unknown error"),
      });
      return { geometry, text: "", words: [], tables: [] };
    }
  }
}

/**
 * Page size in preview pixels. When the page was rendered at another
 * resolution, the point size (if the rasterizer reported it) gives the same
 * numbers the preview renderer produces.
 */
export function previewGeometry(image: RasterImage, dpi: number): PageGeometry {
  if (image.dpi === dpi) {
    return { pageNumber: image.pageIndex, widthPx: image.width, heightPx: image.height };
  }
  if (image.widthPts !== undefined && image.heightPts !== undefined) {
    return {
      pageNumber: image.pageIndex,
      widthPx: toPixels(image.widthPts, dpi),
      heightPx: toPixels(image.heightPts, dpi),
    };
  }
  return {
    pageNumber: image.pageIndex,
    widthPx: rescale(image.width, image.dpi, dpi),
    heightPx: rescale(image.height, image.dpi, dpi),
  };
}

export function tokensToWords(tokens: OcrToken[], imageDpi: number, dpi: number): WordBox[] {
  const words: WordBox[] = [];

  for (const token of tokens) {
    const text = token.text.trim();
    if (text === "") continue;

    const { left, top, width, height } = token;
    words.push({
      text,
      bbox: rescaleBox([left, top, left + width, top + height], imageDpi, dpi),
      confidence: clampConfidence(token.confidence),
    });
  }

  return words;
}

function clampConfidence(value: number): number {
  if (!Number.isFinite(value) || value < 0) return -1;
  return Math.min(Math.trunc(value), 100);
}
