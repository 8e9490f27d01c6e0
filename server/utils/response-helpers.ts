/**
 * Response helpers. Every JSON route answers with the same envelope:
 * `{ success: true, data }` or `{ success: false, message, error? }`.
 */

import type { Response } from "express";
import { ExtractionError } from "../extraction/errors";
import { createLogger } from "../logger";

const log = createLogger("response");

interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
}

/**
 * @example
 * jsonSuccess(res, { filename, originalName });
 * jsonSuccess(res, created, 201);
 */
export function jsonSuccess<T>(res: Response, data: T, status: number = 200): void {
  const body: ApiResponse<T> = { success: true, data };
  res.status(status).json(body);
}

/**
 * @example
 * jsonError(res, "Invalid filename");
 * jsonError(res, "File not found", 404, "DOCUMENT_NOT_FOUND");
 */
export function jsonError(res: Response, message: string, status: number = 400, code?: string): void {
  const body: ApiResponse = code ? { success: false, message, error: code } : { success: false, message };
  res.status(status).json(body);
}

export function jsonNotFound(res: Response, resource: string): void {
  jsonError(res, `${resource} not found`, 404);
}

export function jsonServerError(res: Response, message: string = "Internal server error"): void {
  jsonError(res, message, 500);
}

/**
 * Render a thrown error. Extraction errors carry their own status and code;
 * anything else is logged and reported as a 500.
 */
export function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof ExtractionError) {
    if (error.status >= 500) {
      log.warn(`${context} failed`, { code: error.code, error: error.message });
    }
    jsonError(res, error.message, error.status, error.code);
    return;
  }

  log.error(`${context} failed`, {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  jsonServerError(res, `${context} failed`);
}
