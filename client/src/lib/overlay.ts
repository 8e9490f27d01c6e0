import {
  isPipelineFailure,
  pipelineIds,
  type ExtractionResponse,
  type PageResult,
  type PipelineId,
  type WordBox,
} from "@shared/schema";

export interface OverlayBox {
  key: string;
  text: string;
  left: number;
  top: number;
  width: number;
  height: number;
  confidence?: number;
}

/**
 * Word boxes are in the preview image's pixel space; `widthPx` is that
 * image's natural width, so one factor scales both axes.
 */
export function scaleWordBoxes(words: readonly WordBox[], widthPx: number, displayWidth: number): OverlayBox[] {
  if (widthPx <= 0) return [];
  const scale = displayWidth / widthPx;

  return words.map((word, index) => {
    const [x0, y0, x1, y1] = word.bbox;
    return {
      key: `${index}-${x0}-${y0}`,
      text: word.text,
      left: x0 * scale,
      top: y0 * scale,
      width: (x1 - x0) * scale,
      height: (y1 - y0) * scale,
      confidence: word.confidence,
    };
  });
}

/**
 * Pipelines that produced pages, in canonical order.
 */
export function successfulPipelines(result: ExtractionResponse | null): PipelineId[] {
  if (!result) return [];
  return pipelineIds.filter((id) => {
    const outcome = result.pipelines[id];
    return outcome !== undefined && !isPipelineFailure(outcome);
  });
}

export function pageOf(
  result: ExtractionResponse | null,
  pipeline: PipelineId | undefined,
  pageIndex: number
): PageResult | undefined {
  if (!result || !pipeline) return undefined;
  const outcome = result.pipelines[pipeline];
  if (!outcome || isPipelineFailure(outcome)) return undefined;
  return outcome.pages[pageIndex];
}

/**
 * Largest page count any successful pipeline reported; 1 before a result
 * exists so the first page can still be previewed.
 */
export function pageCount(result: ExtractionResponse | null): number {
  let count = 1;
  for (const id of successfulPipelines(result)) {
    const outcome = result?.pipelines[id];
    if (outcome && !isPipelineFailure(outcome)) {
      count = Math.max(count, outcome.pages.length);
    }
  }
  return count;
}
