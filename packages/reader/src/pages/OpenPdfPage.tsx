import type { DocumentSource } from "@quire/pdf-render";
import { FileText } from "lucide-react";
import { type FormEvent, useState } from "react";
import { useLocation } from "wouter";
import { readerEngine, readerEngineOptions } from "../engine";
import { PdfReader } from "../pdf/PdfReader";

/**
 * Landing page: pick a local PDF or open one by URL.
 */
export function OpenPdfPage() {
  const [, navigate] = useLocation();
  const [source, setSource] = useState<DocumentSource | null>(null);
  const [singlePage, setSinglePage] = useState(false);
  const [url, setUrl] = useState("");

  if (source) {
    return (
      <PdfReader
        source={source}
        singlePage={singlePage}
        engine={readerEngine}
        engineOptions={readerEngineOptions}
        onDismiss={() => setSource(null)}
      />
    );
  }

  const handleSubmit = (e: FormEvent) => {
    e.preventDefault();
    const trimmed = url.trim();
    if (!trimmed) return;
    const query = new URLSearchParams({ src: trimmed });
    if (singlePage) query.set("single", "1");
    navigate(`/pdf?${query.toString()}`);
  };

  return (
    <div className="min-h-screen flex items-center justify-center p-4">
      <div className="w-full max-w-md bg-white rounded-lg shadow p-6 flex flex-col gap-4">
        <h1 className="flex items-center gap-2 text-lg font-semibold">
          <FileText className="w-5 h-5" />
          Open PDF
        </h1>

        <label className="flex flex-col gap-1 text-sm">
          From this device
          <input
            type="file"
            accept="application/pdf,.pdf"
            onChange={(e) => {
              const file = e.target.files?.[0];
              if (file) setSource({ kind: "file", file });
            }}
          />
        </label>

        <form onSubmit={handleSubmit} className="flex flex-col gap-1 text-sm">
          From a link
          <div className="flex gap-2">
            <input
              type="url"
              value={url}
              onChange={(e) => setUrl(e.target.value)}
              placeholder="https://example.com/document.pdf"
              className="flex-1 px-2 py-1 border rounded"
            />
            <button
              type="submit"
              className="px-3 py-1 rounded bg-blue-600 text-white font-medium hover:bg-blue-700"
            >
              Open
            </button>
          </div>
        </form>

        <label className="flex items-center gap-2 text-sm">
          <input
            type="checkbox"
            checked={singlePage}
            onChange={(e) => setSinglePage(e.target.checked)}
          />
          One page at a time
        </label>
      </div>
    </div>
  );
}

export default OpenPdfPage;
