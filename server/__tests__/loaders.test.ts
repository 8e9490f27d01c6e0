import { describe, it, expect, vi, afterEach } from "vitest";

vi.mock("@napi-rs/canvas", () => {
  throw new Error("Cannot find native binding");
});

vi.mock("pdfjs-dist/legacy/build/pdf.mjs", () => ({
  version: "test-build",
}));

import { loadCanvas, loadPdfjs, resolveLanguageData } from "../engines/loaders";
import { DependencyUnavailableError } from "../extraction/errors";
import { AffineMatrix } from "../engines/polyfills";

describe("loaders", () => {
  const hadMatrix = Reflect.has(globalThis, "DOMMatrix");

  afterEach(() => {
    if (!hadMatrix) Reflect.deleteProperty(globalThis, "DOMMatrix");
  });

  it("should turn a failed import into DependencyUnavailableError", async () => {
    const error = await loadCanvas().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DependencyUnavailableError);
    expect(error).toMatchObject({ message: "@napi-rs/canvas is not available on this server" });
  });

  it("should load pdfjs with the matrix fallback when canvas is missing", async () => {
    const pdfjs = await loadPdfjs();

    expect(pdfjs).toMatchObject({ version: "test-build" });
    if (!hadMatrix) {
      expect(Reflect.get(globalThis, "DOMMatrix")).toBe(AffineMatrix);
    }
  });

  it("should memoize a successful load", async () => {
    expect(await loadPdfjs()).toBe(await loadPdfjs());
  });
});

describe("resolveLanguageData", () => {
  it("should point at the model directory inside the language package", () => {
    const resolve = vi.fn(() => "/deps/node_modules/@tesseract.js-data/eng/package.json");

    expect(resolveLanguageData("eng", resolve)).toBe("/deps/node_modules/@tesseract.js-data/eng/4.0.0_best_int");
    expect(resolve).toHaveBeenCalledWith("@tesseract.js-data/eng/package.json");
  });

  it("should report a missing language package as an unavailable dependency", () => {
    const resolve = () => {
      throw new Error("Cannot find module '@tesseract.js-data/fra/package.json'");
    };

    expect(() => resolveLanguageData("fra", resolve)).toThrow(DependencyUnavailableError);
    expect(() => resolveLanguageData("fra", resolve)).toThrow("@tesseract.js-data/fra is not available on this server");
  });

  it("should require an explicit lang path for combined languages", () => {
    const resolve = vi.fn(() => "/unused/package.json");

    expect(() => resolveLanguageData("eng+deu", resolve)).toThrow(DependencyUnavailableError);
    expect(resolve).not.toHaveBeenCalled();
  });
});
