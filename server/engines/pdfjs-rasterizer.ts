/**
 * Page rendering with pdfjs-dist onto @napi-rs/canvas surfaces.
 */

import type { PageRange, RasterImage, Rasterizer } from "../extraction/types";
import { DependencyUnavailableError, PipelineExecutionError, getErrorMessage } from "../extraction/errors";
import { pointScale, toPixels } from "../extraction/coordinates";
import { loadCanvas, loadPdfjs, type CanvasModule, type PdfjsModule } from "./loaders";
import { createLogger } from "../logger";

const log = createLogger("pdfjs-rasterizer");

type Canvas = InstanceType<CanvasModule["Canvas"]>;
type PdfjsDocumentProxy = Awaited<ReturnType<PdfjsModule["getDocument"]>["promise"]>;
type PdfjsPageProxy = Awaited<ReturnType<PdfjsDocumentProxy["getPage"]>>;
type RenderContext = Parameters<PdfjsPageProxy["render"]>[0]["canvasContext"];

interface CanvasEntry {
  canvas: Canvas;
  context: ReturnType<Canvas["getContext"]>;
}

/**
 * pdfjs creates scratch canvases (patterns, masks) through this factory.
 * Without it, pdfjs would look for the `canvas` package.
 */
function napiCanvasFactory(canvasModule: CanvasModule) {
  return class NapiCanvasFactory {
    create(width: number, height: number): CanvasEntry {
      const canvas = canvasModule.createCanvas(Math.max(1, width), Math.max(1, height));
      return { canvas, context: canvas.getContext("2d") };
    }

    reset(entry: CanvasEntry, width: number, height: number): void {
      entry.canvas.width = width;
      entry.canvas.height = height;
    }

    destroy(entry: CanvasEntry): void {
      entry.canvas.width = 0;
      entry.canvas.height = 0;
    }
  };
}

/**
 * pdfjs types its target as a DOM 2D context; the @napi-rs/canvas context
 * implements the drawing calls it makes.
 */
export function isRenderContext(context: object): context is RenderContext {
  return typeof Reflect.get(context, "drawImage") === "function" && typeof Reflect.get(context, "fillRect") === "function";
}

/**
 * Clamp a requested range to the document. An empty result means the
 * range lies entirely outside it.
 */
export function clampRange(pageCount: number, range?: PageRange): number[] {
  const first = Math.max(0, range?.first ?? 0);
  const last = Math.min(pageCount - 1, range?.last ?? pageCount - 1);
  const pages: number[] = [];
  for (let index = first; index <= last; index++) {
    pages.push(index);
  }
  return pages;
}

export class PdfjsRasterizer implements Rasterizer {
  readonly name = "pdfjs-dist + @napi-rs/canvas";

  async ensureAvailable(): Promise<void> {
    await loadCanvas();
    await loadPdfjs();
  }

  async render(data: Uint8Array, dpi: number, range?: PageRange): Promise<RasterImage[]> {
    const canvasModule = await loadCanvas();
    const pdfjs = await loadPdfjs();

    let doc: PdfjsDocumentProxy;
    try {
      doc = await pdfjs.getDocument({
        data: new Uint8Array(data),
        useSystemFonts: true,
        CanvasFactory: napiCanvasFactory(canvasModule),
      }).promise;
    } catch (error) {
      if (error instanceof DependencyUnavailableError) throw error;
      throw new PipelineExecutionError(`Failed to open PDF: ${getErrorMessage(error, "unreadable document")}`, {
        cause: error,
      });
    }

    try {
      const images: RasterImage[] = [];

      for (const pageIndex of clampRange(doc.numPages, range)) {
        const page = await doc.getPage(pageIndex + 1);
        const base = page.getViewport({ scale: 1 });
        const viewport = page.getViewport({ scale: pointScale(dpi) });

        const width = toPixels(base.width, dpi);
        const height = toPixels(base.height, dpi);
        const canvas = canvasModule.createCanvas(Math.max(1, width), Math.max(1, height));
        const context = canvas.getContext("2d");
        if (!isRenderContext(context)) {
          throw new PipelineExecutionError("Canvas does not provide a 2D drawing context");
        }

        context.fillStyle = "#ffffff";
        context.fillRect(0, 0, canvas.width, canvas.height);

        await page.render({ canvasContext: context, viewport }).promise;
        page.cleanup();

        images.push({
          pageIndex,
          width: canvas.width,
          height: canvas.height,
          dpi,
          widthPts: base.width,
          heightPts: base.height,
          png: canvas.toBuffer("image/png"),
        });
      }

      log.debug("Rendered pages", { pages: images.length, dpi });
      return images;
    } finally {
      await doc.destroy();
    }
  }
}
