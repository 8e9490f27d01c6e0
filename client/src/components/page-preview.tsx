import { useMemo } from "react";
import type { PageResult } from "@shared/schema";
import { scaleWordBoxes } from "@/lib/overlay";

interface PagePreviewProps {
  src: string | null;
  pageIndex: number;
  page?: PageResult;
  maxWidth?: number;
}

const DEFAULT_MAX_WIDTH = 800;

/**
 * Page image with the word boxes of one pipeline drawn over it. The image
 * is shown at `min(widthPx, maxWidth)` and the boxes scaled to match.
 */
export function PagePreview({ src, pageIndex, page, maxWidth = DEFAULT_MAX_WIDTH }: PagePreviewProps) {
  const displayWidth = page ? Math.min(page.geometry.widthPx, maxWidth) : maxWidth;

  const boxes = useMemo(
    () => (page ? scaleWordBoxes(page.words, page.geometry.widthPx, displayWidth) : []),
    [page, displayWidth]
  );

  if (!src) {
    return <div className="text-gray-400">Upload a PDF and run extraction to see the preview and word boxes</div>;
  }

  return (
    <div className="relative" style={{ width: displayWidth }}>
      <img
        src={src}
        width={displayWidth}
        alt={`Page ${pageIndex + 1} preview`}
        className="block max-w-full"
      />
      <div className="absolute left-0 top-0" aria-hidden="true">
        {boxes.map((box) => (
          <div
            key={box.key}
            data-word={box.text}
            title={box.confidence === undefined ? box.text : `${box.text} (${box.confidence})`}
            style={{
              position: "absolute",
              left: box.left,
              top: box.top,
              width: box.width,
              height: box.height,
              border: "2px solid rgba(0,200,128,0.7)",
              background: "rgba(0,200,128,0.08)",
              boxSizing: "border-box",
              pointerEvents: "none",
            }}
          />
        ))}
      </div>
    </div>
  );
}
