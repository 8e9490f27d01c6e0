/**
 * Structural parser backed by pdfjs-dist.
 *
 * Text runs come from getTextContent() and are mapped through the page's
 * unscaled viewport, which flips the y axis so the origin is top-left.
 */

import type { ParsedWord, RawTable, StructuralDocument, StructuralPage, StructuralParser } from "../extraction/types";
import { PipelineExecutionError, DependencyUnavailableError, getErrorMessage } from "../extraction/errors";
import { loadPdfjs, type PdfjsModule } from "./loaders";
import { buildPageText, detectTables, groupIntoLines, splitRunIntoWords, type TextRun } from "./layout";
import { createLogger } from "../logger";

const log = createLogger("pdfjs-parser");

type PdfDocument = Awaited<ReturnType<PdfjsModule["getDocument"]>["promise"]>;
type PdfPage = Awaited<ReturnType<PdfDocument["getPage"]>>;

/**
 * Six-number affine transform, or undefined when the value is not one.
 */
function asTransform(value: unknown): number[] | undefined {
  if (!Array.isArray(value) || value.length !== 6) return undefined;
  const numbers: number[] = [];
  for (const entry of value) {
    if (typeof entry !== "number" || !Number.isFinite(entry)) return undefined;
    numbers.push(entry);
  }
  return numbers;
}

class PdfjsPage implements StructuralPage {
  readonly widthPts: number;
  readonly heightPts: number;
  private lines?: Promise<ParsedWord[][]>;

  constructor(
    private readonly pdfjs: PdfjsModule,
    private readonly page: PdfPage
  ) {
    const viewport = page.getViewport({ scale: 1 });
    this.widthPts = viewport.width;
    this.heightPts = viewport.height;
  }

  async extractText(): Promise<string | null> {
    const lines = await this.getLines();
    return lines.length > 0 ? buildPageText(lines) : null;
  }

  async extractWords(): Promise<ParsedWord[]> {
    const lines = await this.getLines();
    return lines.flat();
  }

  async extractTables(): Promise<RawTable[]> {
    return detectTables(await this.getLines());
  }

  private getLines(): Promise<ParsedWord[][]> {
    if (!this.lines) {
      this.lines = this.readRuns().then((runs) => groupIntoLines(runs.flatMap(splitRunIntoWords)));
    }
    return this.lines;
  }

  private async readRuns(): Promise<TextRun[]> {
    const viewport = this.page.getViewport({ scale: 1 });
    const viewportTransform = asTransform(viewport.transform);
    const content = await this.page.getTextContent();
    const runs: TextRun[] = [];

    for (const item of content.items) {
      if (!("str" in item) || !item.str.trim()) continue;

      const itemTransform = asTransform(item.transform);
      if (!viewportTransform || !itemTransform) continue;

      const [, , c, d, x, baseline] = this.pdfjs.Util.transform(viewportTransform, itemTransform);
      runs.push({
        text: item.str,
        x,
        baseline,
        width: item.width,
        height: Math.hypot(c, d),
      });
    }

    return runs;
  }
}

class PdfjsDocument implements StructuralDocument {
  constructor(
    private readonly pdfjs: PdfjsModule,
    private readonly doc: PdfDocument
  ) {}

  get pageCount(): number {
    return this.doc.numPages;
  }

  async getPage(index: number): Promise<StructuralPage> {
    // pdfjs numbers pages from 1
    const page = await this.doc.getPage(index + 1);
    return new PdfjsPage(this.pdfjs, page);
  }

  async close(): Promise<void> {
    await this.doc.destroy();
  }
}

export class PdfjsParser implements StructuralParser {
  readonly name = "pdfjs-dist";

  async ensureAvailable(): Promise<void> {
    await loadPdfjs();
  }

  async open(data: Uint8Array): Promise<StructuralDocument> {
    const pdfjs = await loadPdfjs();
    try {
      const doc = await pdfjs.getDocument({ data, useSystemFonts: true }).promise;
      log.debug("Opened PDF", { totalPages: doc.numPages });
      return new PdfjsDocument(pdfjs, doc);
    } catch (error) {
      if (error instanceof DependencyUnavailableError) throw error;
      throw new PipelineExecutionError(`Failed to open PDF: ${getErrorMessage(error, "unreadable document")}`, {
        cause: error,
      });
    }
  }
}
