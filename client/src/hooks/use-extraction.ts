import { useMutation, useQuery } from "@tanstack/react-query";
import type { PipelineId } from "@shared/schema";
import { extractDocument, fetchPipelines, uploadDocument } from "@/lib/api";

export function usePipelines() {
  return useQuery({
    queryKey: ["pipelines"],
    queryFn: fetchPipelines,
  });
}

export function useUploadDocument() {
  return useMutation({
    mutationFn: (file: File) => uploadDocument(file),
  });
}

export function useRunExtraction() {
  return useMutation({
    mutationFn: ({ filename, pipelines }: { filename: string; pipelines: PipelineId[] }) =>
      extractDocument(filename, pipelines),
  });
}
