import { describe, it, expect, vi, afterEach } from "vitest";
import { runExtraction, selectPipelines, buildSummary, truncateChars } from "../extraction/orchestrator";
import { PipelineRegistry } from "../extraction/registry";
import { DependencyUnavailableError, InvalidRequestError } from "../extraction/errors";
import { StubAdapter, makeDocument, makePage, waitForAbort } from "./helpers/fakes";

function registryWith(...adapters: StubAdapter[]): PipelineRegistry {
  const registry = new PipelineRegistry();
  adapters.forEach((adapter) => registry.register(adapter));
  return registry;
}

const structural = () => new StubAdapter("structural", async () => [makePage("text layer")]);
const ocr = () => new StubAdapter("ocr", async () => [makePage("ocr text")]);

describe("selectPipelines", () => {
  const registry = registryWith(structural(), ocr());

  it("should keep request order and drop duplicates", () => {
    expect(selectPipelines(["ocr", "structural", "ocr"], registry)).toEqual(["ocr", "structural"]);
  });

  it("should silently drop unknown identifiers", () => {
    expect(selectPipelines(["bogus", "structural"], registry)).toEqual(["structural"]);
  });

  it("should reject a request with no valid pipeline", () => {
    expect(() => selectPipelines(["bogus"], registry)).toThrow(InvalidRequestError);
    expect(() => selectPipelines([], registry)).toThrow("No valid pipelines chosen. Supported: structural, ocr");
  });
});

describe("runExtraction", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should return per-pipeline pages and a summary", async () => {
    const response = await runExtraction(makeDocument("a.pdf"), ["structural", "ocr"], {
      registry: registryWith(structural(), ocr()),
      dpi: 150,
    });

    expect(response.filename).toBe("a.pdf");
    expect(response.pipelines).toEqual({
      structural: { pages: [makePage("text layer")] },
      ocr: { pages: [makePage("ocr text")] },
    });
    expect(response.summaryMarkdown).toBe(
      "## structural - page 0 text\n\n```\ntext layer\n```\n\n\n## ocr - page 0 text\n\n```\nocr text\n```\n"
    );
  });

  it("should pass the preview resolution to every adapter", async () => {
    const adapter = structural();

    await runExtraction(makeDocument(), ["structural"], { registry: registryWith(adapter), dpi: 200 });

    expect(adapter.calls[0].dpi).toBe(200);
  });

  it("should not run a pipeline marked unavailable", async () => {
    const unavailable = ocr();
    unavailable.availabilityError = new DependencyUnavailableError("tesseract.js");
    const registry = registryWith(structural(), unavailable);
    await registry.initialize();

    const response = await runExtraction(makeDocument(), ["structural", "ocr"], { registry, dpi: 150 });

    expect(unavailable.calls).toHaveLength(0);
    expect(response.pipelines.ocr).toEqual({
      error: "tesseract.js is not available on this server",
      code: "DEPENDENCY_UNAVAILABLE",
    });
    expect(response.pipelines.structural).toEqual({ pages: [makePage("text layer")] });
  });

  it("should map a dependency failure during the run", async () => {
    const failing = new StubAdapter("ocr", async () => {
      throw new DependencyUnavailableError("@napi-rs/canvas");
    });

    const response = await runExtraction(makeDocument(), ["ocr"], { registry: registryWith(failing), dpi: 150 });

    expect(response.pipelines.ocr).toEqual({
      error: "@napi-rs/canvas is not available on this server",
      code: "DEPENDENCY_UNAVAILABLE",
    });
    expect(response.summaryMarkdown).toBe("");
  });

  it("should isolate an execution failure to its pipeline", async () => {
    const failing = new StubAdapter("structural", async () => {
      throw new Error("Invalid PDF structure");
    });

    const response = await runExtraction(makeDocument(), ["structural", "ocr"], {
      registry: registryWith(failing, ocr()),
      dpi: 150,
    });

    expect(response.pipelines.structural).toEqual({ error: "Invalid PDF structure", code: "EXECUTION_FAILED" });
    expect(response.pipelines.ocr).toEqual({ pages: [makePage("ocr text")] });
    expect(response.summaryMarkdown).toBe("## ocr - page 0 text\n\n```\nocr text\n```\n");
  });

  it("should time out one pipeline without affecting the other", async () => {
    vi.useFakeTimers();
    const slow = new StubAdapter("ocr", (_document, { signal }) => waitForAbort(signal));

    const pending = runExtraction(makeDocument(), ["structural", "ocr"], {
      registry: registryWith(structural(), slow),
      dpi: 150,
      timeoutMs: 1000,
    });
    await vi.advanceTimersByTimeAsync(1000);
    const response = await pending;

    expect(response.pipelines.ocr).toEqual({ error: "Timed out after 1000ms", code: "TIMED_OUT" });
    expect(response.pipelines.structural).toEqual({ pages: [makePage("text layer")] });
  });

  it("should report cancellation when the request is aborted", async () => {
    const controller = new AbortController();
    const waiting = new StubAdapter("structural", (_document, { signal }) => waitForAbort(signal));

    const pending = runExtraction(makeDocument(), ["structural"], {
      registry: registryWith(waiting),
      dpi: 150,
      signal: controller.signal,
    });
    controller.abort();

    expect((await pending).pipelines.structural).toEqual({ error: "Processing cancelled", code: "CANCELLED" });
  });

  it("should run each duplicate identifier once", async () => {
    const adapter = structural();

    const response = await runExtraction(makeDocument(), ["structural", "structural"], {
      registry: registryWith(adapter),
      dpi: 150,
    });

    expect(adapter.calls).toHaveLength(1);
    expect(Object.keys(response.pipelines)).toEqual(["structural"]);
  });

  it("should run the adapters again for every request on identical bytes", async () => {
    const texts = ["", "recovered text"];
    let run = 0;
    const adapter = new StubAdapter("structural", async () => [makePage(texts[run++] ?? "")]);
    const options = { registry: registryWith(adapter), dpi: 150 };

    const first = await runExtraction(makeDocument("first.pdf", "same bytes"), ["structural"], options);
    const second = await runExtraction(makeDocument("first.pdf", "same bytes"), ["structural"], options);

    expect(adapter.calls).toHaveLength(2);
    expect(first.pipelines.structural).toEqual({ pages: [makePage("")] });
    expect(second.pipelines.structural).toEqual({ pages: [makePage("recovered text")] });
  });
});

describe("buildSummary", () => {
  it("should truncate page 0 text to 2000 characters", () => {
    const summary = buildSummary(["structural"], { structural: { pages: [makePage("x".repeat(2500))] } });

    expect(summary).toBe(`## structural - page 0 text\n\n\`\`\`\n${"x".repeat(2000)}\n\`\`\`\n`);
  });

  it("should truncate every pipeline's page 0 text independently", () => {
    const summary = buildSummary(["structural", "ocr"], {
      structural: { pages: [makePage("s".repeat(2001))] },
      ocr: { pages: [makePage("o".repeat(4000))] },
    });

    expect(summary).toBe(
      `## structural - page 0 text\n\n\`\`\`\n${"s".repeat(2000)}\n\`\`\`\n` +
        "\n\n" +
        `## ocr - page 0 text\n\n\`\`\`\n${"o".repeat(2000)}\n\`\`\`\n`
    );
  });

  it("should skip pipelines with no pages or an error", () => {
    const summary = buildSummary(["structural", "ocr"], {
      structural: { pages: [] },
      ocr: { error: "boom", code: "EXECUTION_FAILED" },
    });

    expect(summary).toBe("");
  });

  it("should only use the first page", () => {
    const summary = buildSummary(["ocr"], { ocr: { pages: [makePage("one"), makePage("two", 1)] } });

    expect(summary).toBe("## ocr - page 0 text\n\n```\none\n```\n");
  });
});

describe("truncateChars", () => {
  it("should count code points, not UTF-16 units", () => {
    expect(truncateChars("😀😀😀", 2)).toBe("😀😀");
    expect(truncateChars("short", 10)).toBe("short");
  });
});
