/**
 * Validation middleware for Express routes.
 *
 * - PDF upload validation (extension + magic bytes)
 * - Generic Zod schema body validation
 */

import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { jsonError } from "../utils/response-helpers";
import { createLogger } from "../logger";

const log = createLogger("validation");

const PDF_MAGIC = "%PDF";

export function hasPdfHeader(buffer: Buffer): boolean {
  return buffer.subarray(0, PDF_MAGIC.length).toString("ascii") === PDF_MAGIC;
}

/**
 * Validate that the uploaded file is a PDF.
 * Checks both extension and magic bytes.
 */
export function validatePdfFile(req: Request, res: Response, next: NextFunction): void {
  if (!req.file) {
    jsonError(res, "No file provided");
    return;
  }

  const filename = req.file.originalname;
  const dot = filename.lastIndexOf(".");
  const ext = dot === -1 ? "" : filename.toLowerCase().slice(dot);

  if (ext !== ".pdf") {
    jsonError(res, "Only PDF uploads are accepted");
    return;
  }

  if (!hasPdfHeader(req.file.buffer)) {
    jsonError(res, "Invalid PDF file: missing PDF header");
    return;
  }

  next();
}

/**
 * Format Zod validation errors into a single message.
 */
export function formatZodError(error: z.ZodError): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
  return issues.join("; ");
}

/**
 * Create a middleware that validates the request body against a Zod schema
 * and replaces it with the parsed value (defaults applied).
 *
 * @example
 * app.post("/api/v1/extract", createBodyValidator(extractRequestSchema), handler);
 */
export function createBodyValidator<T>(schema: z.ZodSchema<T>) {
  return function validateBody(req: Request, res: Response, next: NextFunction): void {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      log.debug("Body validation failed", { errors: result.error.issues });
      jsonError(res, formatZodError(result.error));
      return;
    }

    req.body = result.data;
    next();
  };
}
