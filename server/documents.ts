import { randomUUID } from "crypto";
import { extractionResponseSchema, type ExtractionResponse, type UploadedDocument } from "@shared/schema";
import type { BlobStorage } from "./storage";
import type { DocumentHandle } from "./extraction/types";
import { InvalidRequestError } from "./extraction/errors";
import { createLogger } from "./logger";

const log = createLogger("documents");

const RESULT_ID_PATTERN = /^[0-9a-f]{32}$/;

function newId(): string {
  return randomUUID().replace(/-/g, "");
}

/**
 * Reject names that could address anything outside the uploads prefix.
 */
export function assertSafeFilename(filename: string): void {
  if (!filename || filename.includes("..") || filename.includes("/") || filename.includes("\\")) {
    throw new InvalidRequestError("Invalid filename");
  }
}

/**
 * Reduce an uploaded file's name to a safe suffix for the stored name.
 */
export function sanitizeOriginalName(originalName: string): string {
  const base = originalName.split(/[\\/]/).pop() ?? "";
  const cleaned = base.replace(/[^A-Za-z0-9._-]/g, "_").replace(/\.{2,}/g, ".");
  return cleaned || "document.pdf";
}

/**
 * Strip the ".pdf" extension from a stored filename.
 */
export function documentStem(filename: string): string {
  return filename.replace(/\.pdf$/i, "");
}

export class DocumentStore {
  constructor(private readonly storage: BlobStorage) {}

  async saveUpload(buffer: Buffer, originalName: string): Promise<UploadedDocument> {
    const filename = `${newId()}_${sanitizeOriginalName(originalName)}`;
    await this.storage.put(this.key(filename), buffer);
    log.info("Stored upload", { filename, originalName, size: buffer.length });
    return { filename, originalName };
  }

  async exists(filename: string): Promise<boolean> {
    assertSafeFilename(filename);
    return this.storage.exists(this.key(filename));
  }

  async load(filename: string): Promise<DocumentHandle | undefined> {
    assertSafeFilename(filename);
    const data = await this.storage.get(this.key(filename));
    if (!data) return undefined;
    return { id: filename, data: new Uint8Array(data) };
  }

  private key(filename: string): string {
    return `uploads/${filename}`;
  }
}

export class ResultStore {
  constructor(private readonly storage: BlobStorage) {}

  /**
   * Persist a response for later retrieval. A storage failure is logged and
   * yields `undefined`: the caller still gets its response, just without a
   * result reference.
   */
  async save(response: ExtractionResponse): Promise<string | undefined> {
    const resultId = newId();
    try {
      await this.storage.put(this.key(resultId), Buffer.from(JSON.stringify(response, null, 2), "utf-8"));
      return resultId;
    } catch (error) {
      log.error("Failed to save result file", {
        filename: response.filename,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  /**
   * A stored file that is not valid JSON or no longer matches the response
   * shape is logged and treated as missing.
   */
  async load(resultId: string): Promise<ExtractionResponse | undefined> {
    if (!RESULT_ID_PATTERN.test(resultId)) {
      throw new InvalidRequestError("Invalid result id");
    }
    const data = await this.storage.get(this.key(resultId));
    if (!data) return undefined;

    let raw: unknown;
    try {
      raw = JSON.parse(data.toString("utf-8"));
    } catch (error) {
      log.warn("Stored result is not valid JSON", {
        resultId,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }

    const parsed = extractionResponseSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn("Stored result does not match the response shape", {
        resultId,
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
      return undefined;
    }
    return parsed.data;
  }

  private key(resultId: string): string {
    return `results/${resultId}.json`;
  }
}
