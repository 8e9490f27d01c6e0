/**
 * Page preview images, rendered once per (document, page, resolution) and
 * kept in blob storage.
 */

import type { BlobStorage } from "./storage";
import type { Rasterizer } from "./extraction/types";
import type { DocumentStore } from "./documents";
import { assertSafeFilename, documentStem } from "./documents";
import { DocumentNotFoundError, InvalidRequestError } from "./extraction/errors";
import { createLogger } from "./logger";

const log = createLogger("preview");

export interface PreviewServiceOptions {
  documents: DocumentStore;
  storage: BlobStorage;
  rasterizer: Rasterizer;
  dpi: number;
}

export function previewKey(filename: string, pageIndex: number, dpi: number): string {
  return `previews/${documentStem(filename)}_p${pageIndex}_${dpi}.png`;
}

/**
 * Accepts a non-negative integer, as a number or a plain decimal string.
 */
export function parsePageIndex(raw: unknown): number {
  const value = typeof raw === "string" && /^\d+$/.test(raw) ? Number(raw) : raw;
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
    throw new InvalidRequestError("Page index must be a non-negative integer");
  }
  return value;
}

export class PreviewService {
  readonly dpi: number;
  private readonly documents: DocumentStore;
  private readonly storage: BlobStorage;
  private readonly rasterizer: Rasterizer;
  private inFlight = new Map<string, Promise<Buffer>>();

  constructor(options: PreviewServiceOptions) {
    this.documents = options.documents;
    this.storage = options.storage;
    this.rasterizer = options.rasterizer;
    this.dpi = options.dpi;
  }

  /**
   * PNG bytes for one page. Concurrent requests for the same page share a
   * single render.
   */
  async getOrCreate(filename: string, pageIndex: number | string): Promise<Buffer> {
    assertSafeFilename(filename);
    const index = parsePageIndex(pageIndex);
    const key = previewKey(filename, index, this.dpi);

    const cached = await this.storage.get(key);
    if (cached) {
      log.debug("Preview served from cache", { key });
      return cached;
    }

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const render = this.render(filename, index, key).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, render);
    return render;
  }

  private async render(filename: string, pageIndex: number, key: string): Promise<Buffer> {
    const document = await this.documents.load(filename);
    if (!document) {
      throw new DocumentNotFoundError(filename);
    }

    const [image] = await this.rasterizer.render(document.data, this.dpi, { first: pageIndex, last: pageIndex });
    if (!image) {
      throw new InvalidRequestError("Page index out of range");
    }

    await this.storage.put(key, image.png);
    log.info("Preview rendered", { filename, pageIndex, dpi: this.dpi, width: image.width, height: image.height });
    return image.png;
  }
}
