import { describe, it, expect, vi } from "vitest";
import { ApiError, apiEndpoints, extractDocument, fetchPipelines, uploadDocument } from "../api";

function stubFetch(status: number, body: unknown) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => ({
    ok: status < 400,
    status,
    json: async () => body,
  }));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("apiEndpoints", () => {
  it("should encode filenames in preview urls", () => {
    expect(apiEndpoints.preview("a b.pdf", 2)).toBe("/api/v1/preview/a%20b.pdf/2");
  });
});

describe("fetchPipelines", () => {
  it("should return the listing from the envelope", async () => {
    const listing = {
      supportedPipelines: ["structural", "ocr"],
      pipelines: [
        { id: "structural", available: true },
        { id: "ocr", available: false, reason: "tesseract.js is not available on this server" },
      ],
    };
    const fetchMock = stubFetch(200, { success: true, data: listing });

    await expect(fetchPipelines()).resolves.toEqual(listing);
    expect(fetchMock).toHaveBeenCalledWith("/api/v1/pipelines", { method: "GET" });
  });

  it("should raise the server message for failed envelopes", async () => {
    stubFetch(404, { success: false, message: "Document not found", error: "DOCUMENT_NOT_FOUND" });

    const error = await fetchPipelines().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ message: "Document not found", status: 404, code: "DOCUMENT_NOT_FOUND" });
  });

  it("should reject bodies that are not JSON", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => ({
        ok: false,
        status: 502,
        json: async () => {
          throw new SyntaxError("Unexpected token <");
        },
      }))
    );

    await expect(fetchPipelines()).rejects.toThrow("Unexpected response from server (502)");
  });

  it("should reject bodies without the envelope", async () => {
    stubFetch(200, { pipelines: [] });

    await expect(fetchPipelines()).rejects.toThrow("Unexpected response from server (200)");
  });

  it("should reject data of the wrong shape", async () => {
    stubFetch(200, { success: true, data: { supportedPipelines: ["layout"], pipelines: [] } });

    await expect(fetchPipelines()).rejects.toThrow("Response did not have the expected shape");
  });
});

describe("uploadDocument", () => {
  it("should post the file as multipart form data", async () => {
    const fetchMock = stubFetch(200, { success: true, data: { filename: "abc.pdf", originalName: "report.pdf" } });
    const file = new File(["%PDF-1.7"], "report.pdf", { type: "application/pdf" });

    await expect(uploadDocument(file)).resolves.toEqual({ filename: "abc.pdf", originalName: "report.pdf" });

    const init = fetchMock.mock.calls[0]?.[1];
    const body = init?.body;
    expect(fetchMock.mock.calls[0]?.[0]).toBe("/api/v1/upload");
    expect(init?.method).toBe("POST");
    expect(body).toBeInstanceOf(FormData);
    if (body instanceof FormData) {
      expect(body.get("file")).toBeInstanceOf(File);
    }
  });
});

describe("extractDocument", () => {
  it("should post the filename and pipelines as JSON", async () => {
    const data = {
      filename: "abc.pdf",
      pipelines: { ocr: { error: "timed out", code: "TIMED_OUT" } },
      summaryMarkdown: "",
    };
    const fetchMock = stubFetch(200, { success: true, data });

    await expect(extractDocument("abc.pdf", ["ocr"])).resolves.toEqual(data);
    expect(fetchMock).toHaveBeenCalledWith("/api/v1/extract", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ filename: "abc.pdf", pipelines: ["ocr"] }),
    });
  });
});
