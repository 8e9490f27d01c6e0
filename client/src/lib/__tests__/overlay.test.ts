import { describe, it, expect } from "vitest";
import type { ExtractionResponse, PageResult } from "@shared/schema";
import { pageCount, pageOf, scaleWordBoxes, successfulPipelines } from "../overlay";

function page(pageNumber: number, text = ""): PageResult {
  return {
    geometry: { pageNumber, widthPx: 1000, heightPx: 1400 },
    text,
    words: [],
    tables: [],
  };
}

function response(pipelines: ExtractionResponse["pipelines"]): ExtractionResponse {
  return { filename: "doc.pdf", pipelines, summaryMarkdown: "" };
}

describe("scaleWordBoxes", () => {
  it("should scale both axes by the display width over the image width", () => {
    const boxes = scaleWordBoxes(
      [
        { text: "Invoice", bbox: [100, 200, 300, 260], confidence: 92 },
        { text: "Total", bbox: [40, 20, 80, 50] },
      ],
      1000,
      500
    );

    expect(boxes).toEqual([
      { key: "0-100-200", text: "Invoice", left: 50, top: 100, width: 100, height: 30, confidence: 92 },
      { key: "1-40-20", text: "Total", left: 20, top: 10, width: 20, height: 15, confidence: undefined },
    ]);
  });

  it("should keep pixel coordinates when shown at natural size", () => {
    const [box] = scaleWordBoxes([{ text: "A", bbox: [3, 4, 13, 24] }], 600, 600);

    expect(box).toMatchObject({ left: 3, top: 4, width: 10, height: 20 });
  });

  it("should return no boxes for a page without width", () => {
    expect(scaleWordBoxes([{ text: "A", bbox: [0, 0, 1, 1] }], 0, 800)).toEqual([]);
  });
});

describe("successfulPipelines", () => {
  it("should list pipelines with pages in canonical order", () => {
    const result = response({
      ocr: { pages: [page(0)] },
      structural: { pages: [page(0)] },
    });

    expect(successfulPipelines(result)).toEqual(["structural", "ocr"]);
  });

  it("should skip failed pipelines", () => {
    const result = response({
      structural: { pages: [page(0)] },
      ocr: { error: "tesseract.js is not available on this server", code: "DEPENDENCY_UNAVAILABLE" },
    });

    expect(successfulPipelines(result)).toEqual(["structural"]);
  });

  it("should return nothing before a result exists", () => {
    expect(successfulPipelines(null)).toEqual([]);
  });
});

describe("pageOf", () => {
  const result = response({
    structural: { pages: [page(0, "first"), page(1, "second")] },
    ocr: { error: "timed out", code: "TIMED_OUT" },
  });

  it("should pick the page of the chosen pipeline", () => {
    expect(pageOf(result, "structural", 1)?.text).toBe("second");
  });

  it("should return undefined for a failed pipeline", () => {
    expect(pageOf(result, "ocr", 0)).toBeUndefined();
  });

  it("should return undefined past the last page", () => {
    expect(pageOf(result, "structural", 2)).toBeUndefined();
  });

  it("should return undefined without a pipeline", () => {
    expect(pageOf(result, undefined, 0)).toBeUndefined();
  });
});

describe("pageCount", () => {
  it("should be 1 before a result exists", () => {
    expect(pageCount(null)).toBe(1);
  });

  it("should use the longest successful pipeline", () => {
    const result = response({
      structural: { pages: [page(0), page(1), page(2)] },
      ocr: { pages: [page(0)] },
    });

    expect(pageCount(result)).toBe(3);
  });

  it("should stay at 1 when every pipeline failed", () => {
    const result = response({ structural: { error: "broken", code: "EXECUTION_FAILED" } });

    expect(pageCount(result)).toBe(1);
  });
});
