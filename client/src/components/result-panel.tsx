import Markdown from "react-markdown";
import { Download } from "lucide-react";
import { isPipelineFailure, pipelineIds, type ExtractionResponse } from "@shared/schema";

interface ResultPanelProps {
  result: ExtractionResponse | null;
}

function downloadMarkdown(result: ExtractionResponse) {
  const blob = new Blob([result.summaryMarkdown], { type: "text/markdown" });
  const url = URL.createObjectURL(blob);
  const link = document.createElement("a");
  link.href = url;
  link.download = `${result.filename.replace(/\.pdf$/i, "")}.md`;
  link.click();
  URL.revokeObjectURL(url);
}

export function ResultPanel({ result }: ResultPanelProps) {
  if (!result) {
    return <div className="text-gray-400">No results yet</div>;
  }

  const failures = pipelineIds.flatMap((id) => {
    const outcome = result.pipelines[id];
    return outcome && isPipelineFailure(outcome) ? [{ id, ...outcome }] : [];
  });

  return (
    <div className="space-y-4">
      <div className="flex items-center justify-between">
        <h2 className="text-xl font-semibold">Extraction Result</h2>
        <button
          type="button"
          onClick={() => downloadMarkdown(result)}
          className="inline-flex items-center gap-2 rounded bg-blue-600 px-3 py-1 text-sm text-white"
        >
          <Download className="h-4 w-4" />
          Download Markdown
        </button>
      </div>

      {failures.length > 0 && (
        <ul className="space-y-1 text-sm text-amber-400" aria-label="Pipeline errors">
          {failures.map((failure) => (
            <li key={failure.id}>
              {failure.id}: {failure.error} ({failure.code})
            </li>
          ))}
        </ul>
      )}

      <div className="prose prose-invert max-w-none rounded bg-gray-900 p-4">
        {result.summaryMarkdown ? <Markdown>{result.summaryMarkdown}</Markdown> : <p>No summary</p>}
      </div>

      <details>
        <summary className="cursor-pointer">Full JSON</summary>
        <pre className="mt-2 whitespace-pre-wrap text-xs">{JSON.stringify(result, null, 2)}</pre>
      </details>
    </div>
  );
}
