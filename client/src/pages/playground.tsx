import { useEffect, useState } from "react";
import { ChevronLeft, ChevronRight, FileText, Loader2, Play } from "lucide-react";
import type { ExtractionResponse, PipelineId, UploadedDocument } from "@shared/schema";
import { UploadZone } from "@/components/upload-zone";
import { PipelineSelector } from "@/components/pipeline-selector";
import { PagePreview } from "@/components/page-preview";
import { ResultPanel } from "@/components/result-panel";
import { usePipelines, useRunExtraction, useUploadDocument } from "@/hooks/use-extraction";
import { apiEndpoints } from "@/lib/api";
import { pageCount, pageOf, successfulPipelines } from "@/lib/overlay";

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export default function Playground() {
  const [file, setFile] = useState<File | null>(null);
  const [uploaded, setUploaded] = useState<UploadedDocument | null>(null);
  const [selected, setSelected] = useState<PipelineId[]>(["structural"]);
  const [result, setResult] = useState<ExtractionResponse | null>(null);
  const [overlayPipeline, setOverlayPipeline] = useState<PipelineId | undefined>();
  const [pageIndex, setPageIndex] = useState(0);
  const [message, setMessage] = useState("");

  const pipelinesQuery = usePipelines();
  const uploadMutation = useUploadDocument();
  const extractMutation = useRunExtraction();

  const overlayChoices = successfulPipelines(result);
  const totalPages = pageCount(result);

  useEffect(() => {
    setOverlayPipeline(successfulPipelines(result)[0]);
    setPageIndex(0);
  }, [result]);

  const handleFileSelect = (next: File | null) => {
    setFile(next);
    setUploaded(null);
    setResult(null);
    setMessage("");
  };

  const handleUpload = () => {
    if (!file) {
      setMessage("Please choose a file.");
      return;
    }
    setMessage("Uploading...");
    uploadMutation.mutate(file, {
      onSuccess: (saved) => {
        setUploaded(saved);
        setResult(null);
        setMessage("Upload complete.");
      },
      onError: (error) => setMessage(`Upload failed: ${errorMessage(error)}`),
    });
  };

  const handleExtract = () => {
    if (!uploaded) {
      setMessage("Upload a file first.");
      return;
    }
    setMessage("Extracting...");
    extractMutation.mutate(
      { filename: uploaded.filename, pipelines: selected },
      {
        onSuccess: (response) => {
          setResult(response);
          setMessage("Extraction complete.");
        },
        onError: (error) => setMessage(`Extraction failed: ${errorMessage(error)}`),
      }
    );
  };

  const previewSrc = uploaded ? apiEndpoints.preview(uploaded.filename, pageIndex) : null;

  return (
    <main className="flex min-h-screen flex-col items-center bg-gray-900 p-8 text-white">
      <h1 className="mb-6 flex items-center gap-2 text-3xl font-bold">
        <FileText className="h-7 w-7" />
        PDF Extraction Playground
      </h1>

      <section className="mb-6">
        <UploadZone
          file={file}
          uploadedName={uploaded?.originalName}
          isUploading={uploadMutation.isPending}
          onFileSelect={handleFileSelect}
          onUpload={handleUpload}
        />
      </section>

      <section className="mb-6 flex flex-wrap items-center gap-4">
        {pipelinesQuery.data ? (
          <PipelineSelector pipelines={pipelinesQuery.data.pipelines} selected={selected} onChange={setSelected} />
        ) : pipelinesQuery.isError ? (
          <span className="text-sm text-red-400">Could not load pipelines: {errorMessage(pipelinesQuery.error)}</span>
        ) : (
          <span className="text-sm text-gray-400">Loading pipelines...</span>
        )}
        <button
          type="button"
          onClick={handleExtract}
          disabled={!uploaded || selected.length === 0 || extractMutation.isPending}
          className="inline-flex items-center gap-2 rounded bg-green-600 px-4 py-2 disabled:opacity-50"
        >
          {extractMutation.isPending ? <Loader2 className="h-4 w-4 animate-spin" /> : <Play className="h-4 w-4" />}
          {extractMutation.isPending ? "Extracting..." : "Run Extraction"}
        </button>
      </section>

      <div className="grid w-full max-w-6xl grid-cols-1 gap-6 lg:grid-cols-2">
        <section className="space-y-3 rounded bg-gray-800 p-4">
          <div className="flex flex-wrap items-center gap-3 text-sm">
            <button
              type="button"
              aria-label="Previous page"
              onClick={() => setPageIndex((index) => Math.max(0, index - 1))}
              disabled={pageIndex === 0}
              className="rounded p-1 disabled:opacity-40"
            >
              <ChevronLeft className="h-4 w-4" />
            </button>
            <span>
              Page {pageIndex + 1} of {totalPages}
            </span>
            <button
              type="button"
              aria-label="Next page"
              onClick={() => setPageIndex((index) => Math.min(totalPages - 1, index + 1))}
              disabled={pageIndex >= totalPages - 1}
              className="rounded p-1 disabled:opacity-40"
            >
              <ChevronRight className="h-4 w-4" />
            </button>
            {overlayChoices.length > 0 && (
              <label className="ml-auto flex items-center gap-2">
                Boxes from
                <select
                  value={overlayPipeline ?? ""}
                  onChange={(e) => setOverlayPipeline(overlayChoices.find((id) => id === e.target.value))}
                  className="rounded bg-gray-900 px-2 py-1"
                >
                  {overlayChoices.map((id) => (
                    <option key={id} value={id}>
                      {id}
                    </option>
                  ))}
                </select>
              </label>
            )}
          </div>
          <PagePreview src={previewSrc} pageIndex={pageIndex} page={pageOf(result, overlayPipeline, pageIndex)} />
        </section>

        <section className="max-h-[70vh] overflow-auto rounded bg-gray-800 p-4">
          <ResultPanel result={result} />
        </section>
      </div>

      <p className="mt-6 text-sm text-gray-400" role="status">
        {message}
      </p>
    </main>
  );
}
