/**
 * Runs the selected pipelines over one document and merges their output.
 *
 * Each pipeline runs concurrently under its own deadline. Whatever happens
 * inside one pipeline ends up in that pipeline's slot of the response; only
 * an invalid selection fails the request as a whole.
 */

import {
  isPipelineFailure,
  type ExtractionResponse,
  type PipelineFailure,
  type PipelineId,
  type PipelineResult,
} from "@shared/schema";
import type { DocumentHandle } from "./types";
import type { PipelineRegistry } from "./registry";
import { DependencyUnavailableError, InvalidRequestError, getErrorMessage, isAbortError } from "./errors";
import { TimeoutError, withTimeout } from "../utils/timeout";
import { createLogger } from "../logger";

const log = createLogger("orchestrator");

export const SUMMARY_PAGE_CHARS = 2000;

export interface ExtractionOptions {
  registry: PipelineRegistry;
  /** Preview resolution every pipeline maps its boxes into. */
  dpi: number;
  /** Per-pipeline deadline; 0 disables it. */
  timeoutMs?: number;
  /** Aborted when the caller goes away. */
  signal?: AbortSignal;
}

/**
 * Keep the registered pipelines, in request order, without duplicates.
 * Unknown identifiers are dropped silently unless nothing valid remains.
 */
export function selectPipelines(requested: readonly string[], registry: PipelineRegistry): PipelineId[] {
  const supported = registry.supported();
  const chosen: PipelineId[] = [];

  for (const id of requested) {
    const match = supported.find((candidate) => candidate === id);
    if (match && !chosen.includes(match)) {
      chosen.push(match);
    }
  }

  if (chosen.length === 0) {
    throw new InvalidRequestError(`No valid pipelines chosen. Supported: ${supported.join(", ")}`);
  }

  return chosen;
}

export async function runExtraction(
  document: DocumentHandle,
  requested: readonly string[],
  options: ExtractionOptions
): Promise<ExtractionResponse> {
  const chosen = selectPipelines(requested, options.registry);

  log.info("Running extraction", { document: document.id, pipelines: chosen, dpi: options.dpi });

  const results = await Promise.all(
    chosen.map((id) => runPipeline(id, document, options))
  );

  const pipelines: Partial<Record<PipelineId, PipelineResult>> = {};
  chosen.forEach((id, index) => {
    pipelines[id] = results[index];
  });

  return {
    filename: document.id,
    pipelines,
    summaryMarkdown: buildSummary(chosen, pipelines),
  };
}

/**
 * Never rejects: every outcome is converted to a PipelineResult.
 */
async function runPipeline(
  id: PipelineId,
  document: DocumentHandle,
  options: ExtractionOptions
): Promise<PipelineResult> {
  const { registry, dpi, timeoutMs = 0, signal } = options;
  const adapter = registry.get(id);
  const availability = registry.getAvailability(id);

  if (!adapter || !availability.available) {
    const reason = availability.available ? `${id} pipeline is not registered` : availability.reason;
    return { error: reason, code: "DEPENDENCY_UNAVAILABLE" };
  }

  const startedAt = Date.now();
  try {
    const pages = await withTimeout(
      (pipelineSignal) => adapter.extract(document, { dpi, signal: pipelineSignal }),
      timeoutMs,
      signal
    );

    log.info("Pipeline complete", {
      pipeline: id,
      document: document.id,
      pages: pages.length,
      durationMs: Date.now() - startedAt,
    });
    return { pages };
  } catch (error) {
    return toPipelineFailure(id, document.id, error);
  }
}

export function toPipelineFailure(id: PipelineId, documentId: string, error: unknown): PipelineFailure {
  if (error instanceof DependencyUnavailableError) {
    log.warn("Pipeline dependency unavailable", { pipeline: id, dependency: error.dependency });
    return { error: error.message, code: "DEPENDENCY_UNAVAILABLE" };
  }

  if (error instanceof TimeoutError) {
    log.warn("Pipeline timed out", { pipeline: id, document: documentId, timeoutMs: error.timeoutMs });
    return { error: error.message, code: "TIMED_OUT" };
  }

  if (isAbortError(error)) {
    log.info("Pipeline cancelled", { pipeline: id, document: documentId });
    return { error: "Processing cancelled", code: "CANCELLED" };
  }

  const message = getErrorMessage(error, `${id} pipeline failed`);
  log.error("Extraction error for pipeline", {
    pipeline: id,
    document: documentId,
    error: message,
    stack: error instanceof Error ? error.stack : undefined,
  });
  return { error: message, code: "EXECUTION_FAILED" };
}

/**
 * Markdown digest: page 0 text of every successful pipeline, in order.
 */
export function buildSummary(
  chosen: readonly PipelineId[],
  pipelines: Partial<Record<PipelineId, PipelineResult>>
): string {
  const parts: string[] = [];

  for (const id of chosen) {
    const result = pipelines[id];
    if (!result || isPipelineFailure(result)) continue;

    const firstPage = result.pages[0];
    if (!firstPage) continue;

    const text = truncateChars(firstPage.text, SUMMARY_PAGE_CHARS);
    parts.push(`## ${id} - page 0 text\n\n\`\`\`\n${text}\n\`\`\`\n`);
  }

  return parts.join("\n\n");
}

/**
 * Truncate by code point so a surrogate pair is never split.
 */
export function truncateChars(text: string, limit: number): string {
  const chars = Array.from(text);
  return chars.length <= limit ? text : chars.slice(0, limit).join("");
}
