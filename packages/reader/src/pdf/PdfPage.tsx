import type { DocumentSource } from "@quire/pdf-render";
import { useMemo } from "react";
import { useLocation, useSearch } from "wouter";
import { readerEngine, readerEngineOptions } from "../engine";
import { PdfReader } from "./PdfReader";

/**
 * Route page: /pdf?src=<url>&single=1
 */
export function PdfPage() {
  const search = useSearch();
  const [, navigate] = useLocation();

  const params = useMemo(() => new URLSearchParams(search), [search]);
  const src = params.get("src");
  const singlePage = params.get("single") === "1";

  const source = useMemo<DocumentSource | null>(
    () => (src ? { kind: "url", url: src } : null),
    [src],
  );

  if (!source) {
    return (
      <div className="min-h-screen flex items-center justify-center text-gray-500">
        No document given. Add ?src=&lt;url&gt; to the address.
      </div>
    );
  }

  return (
    <PdfReader
      source={source}
      singlePage={singlePage}
      engine={readerEngine}
      engineOptions={readerEngineOptions}
      onDismiss={() => navigate("/")}
    />
  );
}

export default PdfPage;
