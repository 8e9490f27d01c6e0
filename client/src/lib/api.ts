/**
 * API client: endpoints and typed requests against the versioned API.
 */

import type { z } from "zod";
import {
  apiEnvelopeSchema,
  extractionResponseSchema,
  pipelineListingSchema,
  uploadedDocumentSchema,
  type ExtractionResponse,
  type PipelineId,
  type PipelineListing,
  type UploadedDocument,
} from "@shared/schema";

const API_VERSION = "v1";
const API_BASE = `/api/${API_VERSION}`;

export const apiEndpoints = {
  upload: `${API_BASE}/upload`,
  extract: `${API_BASE}/extract`,
  pipelines: `${API_BASE}/pipelines`,
  preview: (filename: string, pageIndex: number) =>
    `${API_BASE}/preview/${encodeURIComponent(filename)}/${pageIndex}`,
  file: (filename: string) => `${API_BASE}/file/${encodeURIComponent(filename)}`,
  result: (resultId: string) => `${API_BASE}/results/${resultId}`,
  health: `${API_BASE}/health`,
} as const;

export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ApiError";
  }
}

async function request<T>(url: string, init: RequestInit, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const res = await fetch(url, init);

  let body: unknown;
  try {
    body = await res.json();
  } catch (error) {
    throw new ApiError(`Unexpected response from server (${res.status})`, res.status, undefined, { cause: error });
  }

  const envelope = apiEnvelopeSchema.safeParse(body);
  if (!envelope.success) {
    throw new ApiError(`Unexpected response from server (${res.status})`, res.status);
  }
  if (!envelope.data.success) {
    throw new ApiError(envelope.data.message, res.status, envelope.data.error);
  }

  const data = schema.safeParse(envelope.data.data);
  if (!data.success) {
    throw new ApiError("Response did not have the expected shape", res.status);
  }
  return data.data;
}

export function fetchPipelines(): Promise<PipelineListing> {
  return request(apiEndpoints.pipelines, { method: "GET" }, pipelineListingSchema);
}

export function uploadDocument(file: File): Promise<UploadedDocument> {
  const formData = new FormData();
  formData.append("file", file);
  return request(apiEndpoints.upload, { method: "POST", body: formData }, uploadedDocumentSchema);
}

export function extractDocument(filename: string, pipelines: PipelineId[]): Promise<ExtractionResponse> {
  return request(
    apiEndpoints.extract,
    {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ filename, pipelines }),
    },
    extractionResponseSchema
  );
}
