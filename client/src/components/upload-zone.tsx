import { Loader2, Upload } from "lucide-react";

interface UploadZoneProps {
  file: File | null;
  uploadedName?: string;
  isUploading: boolean;
  onFileSelect: (file: File | null) => void;
  onUpload: () => void;
}

export function UploadZone({ file, uploadedName, isUploading, onFileSelect, onUpload }: UploadZoneProps) {
  return (
    <div className="flex flex-wrap items-center gap-4">
      <input
        type="file"
        accept="application/pdf,.pdf"
        aria-label="PDF file"
        onChange={(e) => onFileSelect(e.target.files?.[0] ?? null)}
        className="text-sm file:mr-4 file:rounded-full file:border-0 file:bg-purple-600 file:px-4 file:py-2 file:text-white"
      />
      <button
        type="button"
        onClick={onUpload}
        disabled={!file || isUploading}
        className="inline-flex items-center gap-2 rounded bg-purple-600 px-4 py-2 text-white disabled:opacity-50"
      >
        {isUploading ? <Loader2 className="h-4 w-4 animate-spin" /> : <Upload className="h-4 w-4" />}
        Upload
      </button>
      {uploadedName && <span className="text-sm text-gray-300">Uploaded: {uploadedName}</span>}
    </div>
  );
}
