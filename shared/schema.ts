import { z } from "zod";

export const pipelineIds = ["structural", "ocr"] as const;

export type PipelineId = (typeof pipelineIds)[number];

export function isPipelineId(value: string): value is PipelineId {
  return pipelineIds.some((id) => id === value);
}

export const pipelineErrorCodes = [
  "DEPENDENCY_UNAVAILABLE",
  "EXECUTION_FAILED",
  "TIMED_OUT",
  "CANCELLED",
] as const;

export type PipelineErrorCode = (typeof pipelineErrorCodes)[number];

/**
 * [x0, y0, x1, y1] in preview pixel space, origin at the top-left corner.
 */
export type BBox = [number, number, number, number];

export const bboxSchema = z.tuple([
  z.number().int(),
  z.number().int(),
  z.number().int(),
  z.number().int(),
]);

export const pageGeometrySchema = z.object({
  pageNumber: z.number().int().nonnegative(),
  widthPts: z.number().optional(),
  heightPts: z.number().optional(),
  widthPx: z.number().int(),
  heightPx: z.number().int(),
});

export type PageGeometry = z.infer<typeof pageGeometrySchema>;

export const wordBoxSchema = z.object({
  text: z.string().min(1),
  bbox: bboxSchema,
  confidence: z.number().int().min(-1).max(100).optional(),
});

export type WordBox = z.infer<typeof wordBoxSchema>;

export const tableBlockSchema = z.object({
  rows: z.array(z.array(z.string())),
});

export type TableBlock = z.infer<typeof tableBlockSchema>;

export const pageResultSchema = z.object({
  geometry: pageGeometrySchema,
  text: z.string(),
  words: z.array(wordBoxSchema),
  tables: z.array(tableBlockSchema),
});

export type PageResult = z.infer<typeof pageResultSchema>;

export const pipelineSuccessSchema = z.object({
  pages: z.array(pageResultSchema),
});

export type PipelineSuccess = z.infer<typeof pipelineSuccessSchema>;

export const pipelineFailureSchema = z.object({
  error: z.string(),
  code: z.enum(pipelineErrorCodes),
});

export type PipelineFailure = z.infer<typeof pipelineFailureSchema>;

export const pipelineResultSchema = z.union([pipelineSuccessSchema, pipelineFailureSchema]);

export type PipelineResult = z.infer<typeof pipelineResultSchema>;

export function isPipelineFailure(result: PipelineResult): result is PipelineFailure {
  return "error" in result;
}

export const extractionResponseSchema = z.object({
  filename: z.string(),
  pipelines: z.object({
    structural: pipelineResultSchema.optional(),
    ocr: pipelineResultSchema.optional(),
  }),
  summaryMarkdown: z.string(),
  resultId: z.string().optional(),
});

export type ExtractionResponse = z.infer<typeof extractionResponseSchema>;

export const extractRequestSchema = z.object({
  filename: z.string().min(1, "filename is required"),
  pipelines: z.array(z.string()).default(["structural"]),
});

export type ExtractRequest = z.infer<typeof extractRequestSchema>;

export const uploadedDocumentSchema = z.object({
  filename: z.string(),
  originalName: z.string(),
});

export type UploadedDocument = z.infer<typeof uploadedDocumentSchema>;

export const pipelineDescriptorSchema = z.object({
  id: z.enum(pipelineIds),
  available: z.boolean(),
  reason: z.string().optional(),
});

export type PipelineDescriptor = z.infer<typeof pipelineDescriptorSchema>;

export const pipelineListingSchema = z.object({
  supportedPipelines: z.array(z.enum(pipelineIds)),
  pipelines: z.array(pipelineDescriptorSchema),
});

export type PipelineListing = z.infer<typeof pipelineListingSchema>;

/**
 * Every API response is wrapped in this envelope.
 */
export const apiEnvelopeSchema = z.discriminatedUnion("success", [
  z.object({ success: z.literal(true), data: z.unknown() }),
  z.object({ success: z.literal(false), message: z.string(), error: z.string().optional() }),
]);
