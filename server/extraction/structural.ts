/**
 * Text-layer extraction: reads the document's embedded text directly and
 * maps point-space geometry into preview pixels.
 */

import type { PageResult, TableBlock, WordBox } from "@shared/schema";
import type {
  AdapterOptions,
  DocumentHandle,
  PipelineAdapter,
  StructuralPage,
  StructuralParser,
} from "./types";
import { pointBoxToPixels, toPixels } from "./coordinates";
import { checkAborted, getErrorMessage } from "./errors";
import { createLogger } from "../logger";

const log = createLogger("structural");

export class StructuralAdapter implements PipelineAdapter {
  readonly id = "structural" as const;
  readonly description: string;

  constructor(private readonly parser: StructuralParser) {
    this.description = `Embedded text layer via ${parser.name}`;
  }

  ensureAvailable(): Promise<void> {
    return this.parser.ensureAvailable();
  }

  async extract(document: DocumentHandle, { dpi, signal }: AdapterOptions): Promise<PageResult[]> {
    checkAborted(signal);

    // Not isolated: a document that cannot be opened fails the pipeline.
    const parsed = await this.parser.open(new Uint8Array(document.data));
    const pages: PageResult[] = [];

    try {
      log.debug("Processing PDF", { document: document.id, totalPages: parsed.pageCount });

      for (let index = 0; index < parsed.pageCount; index++) {
        checkAborted(signal);
        const page = await parsed.getPage(index);
        pages.push(await this.extractPage(page, index, dpi, document.id));
      }
    } finally {
      await parsed.close();
    }

    return pages;
  }

  private async extractPage(
    page: StructuralPage,
    pageNumber: number,
    dpi: number,
    documentId: string
  ): Promise<PageResult> {
    const context = { document: documentId, page: pageNumber };

    let text = "";
    try {
      text = (await page.extractText()) ?? "";
    } catch (error) {
      log.warn("Page text extraction failed", { ...context, error: getErrorMessage(error, "unknown error") });
    }

    let words: WordBox[] = [];
    try {
      const raw = await page.extractWords();
      words = raw
        .filter((word) => word.text.trim() !== "")
        .map((word) => ({
          text: word.text,
          bbox: pointBoxToPixels([word.x0, word.top, word.x1, word.bottom], dpi),
        }));
    } catch (error) {
      words = [];
      log.warn("Word extraction failed", { ...context, error: getErrorMessage(error, "unknown error") });
    }

    let tables: TableBlock[] = [];
    try {
      const raw = await page.extractTables();
      tables = raw.map((rows) => ({
        rows: rows.map((row) => row.map((cell) => cell ?? "")),
      }));
    } catch (error) {
      tables = [];
      log.warn("Table extraction failed", { ...context, error: getErrorMessage(error, "unknown error") });
    }

    return {
      geometry: {
        pageNumber,
        widthPts: page.widthPts,
        heightPts: page.heightPts,
        widthPx: toPixels(page.widthPts, dpi),
        heightPx: toPixels(page.heightPts, dpi),
      },
      text,
      words,
      tables,
    };
  }
}
