/**
 * Lazy loading of the optional native/heavy libraries.
 *
 * Each loader imports its package on first use and memoizes the module.
 * A failed import surfaces as DependencyUnavailableError naming the package,
 * and is retried on the next call.
 */

import { createRequire } from "module";
import path from "path";
import { DependencyUnavailableError } from "../extraction/errors";
import { installCanvasGlobals, installMatrixFallback } from "./polyfills";
import { createLogger } from "../logger";

const log = createLogger("loaders");
const requireFromHere = createRequire(import.meta.url);

/** Model set tesseract.js 5 loads by default (LSTM, integer weights). */
export const LANGUAGE_DATA_VARIANT = "4.0.0_best_int";

export type PdfjsModule = typeof import("pdfjs-dist/legacy/build/pdf.mjs");
export type CanvasModule = typeof import("@napi-rs/canvas");
export type TesseractModule = typeof import("tesseract.js");

function memoize<T>(dependency: string, load: () => Promise<T>): () => Promise<T> {
  let pending: Promise<T> | undefined;

  return () => {
    if (!pending) {
      pending = load().catch((error: unknown) => {
        pending = undefined;
        log.warn("Failed to load dependency", {
          dependency,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error instanceof DependencyUnavailableError
          ? error
          : new DependencyUnavailableError(dependency, error);
      });
    }
    return pending;
  };
}

export const loadCanvas = memoize<CanvasModule>("@napi-rs/canvas", () => import("@napi-rs/canvas"));

/**
 * pdfjs needs DOMMatrix (and, for rendering, Path2D and ImageData) as
 * globals before its module body runs.
 */
export const loadPdfjs = memoize<PdfjsModule>("pdfjs-dist", async () => {
  try {
    installCanvasGlobals(await loadCanvas());
  } catch {
    log.info("Canvas unavailable; text extraction only");
    installMatrixFallback();
  }
  return import("pdfjs-dist/legacy/build/pdf.mjs");
});

export const loadTesseract = memoize<TesseractModule>("tesseract.js", () => import("tesseract.js"));

/**
 * Directory holding `<lang>.traineddata.gz` from the installed
 * @tesseract.js-data package, so tesseract.js never falls back to its CDN.
 * Combined languages ("eng+deu") live in separate packages and need an
 * explicit lang path instead.
 */
export function resolveLanguageData(
  lang: string,
  resolve: (id: string) => string = (id) => requireFromHere.resolve(id)
): string {
  const dependency = `@tesseract.js-data/${lang}`;
  if (lang.includes("+")) {
    throw new DependencyUnavailableError(`${dependency} (set OCR_LANG_PATH for combined languages)`);
  }

  try {
    return path.join(path.dirname(resolve(`${dependency}/package.json`)), LANGUAGE_DATA_VARIANT);
  } catch (error) {
    throw new DependencyUnavailableError(dependency, error);
  }
}
