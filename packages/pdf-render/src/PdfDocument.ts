import type { DocumentHandle } from "./engines";

/**
 * Where a document's bytes come from.
 * - url: fetched (http(s), blob: or data: URLs)
 * - file: a browser File/Blob; File.name is used as the filename
 * - bytes: an in-memory buffer, optionally named
 */
export type DocumentSource =
  | { kind: "url"; url: string }
  | { kind: "file"; file: Blob }
  | { kind: "bytes"; data: Uint8Array; name?: string };

/**
 * Immutable in-memory document: the unmodified bytes plus what is derived
 * from them at load time.
 */
export interface PdfDocument {
  readonly data: Uint8Array;
  /** Metadata title, or the filename stem when metadata has none. */
  readonly title: string;
  /** Default filename for export: title with a .pdf extension. */
  readonly fileName: string;
  readonly singlePage: boolean;
  readonly source: DocumentSource;
}

export type DocumentLoadErrorKind = "read" | "parse";

export class DocumentLoadError extends Error {
  readonly kind: DocumentLoadErrorKind;

  constructor(kind: DocumentLoadErrorKind, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "DocumentLoadError";
    this.kind = kind;
  }
}

export type LoadResult =
  | { ok: true; document: PdfDocument; handle: DocumentHandle }
  | { ok: false; error: DocumentLoadError };

export const PDF_MIME_TYPE = "application/pdf";

// Copied into a fresh ArrayBuffer-backed view: Blob parts may not be
// backed by a SharedArrayBuffer
export function toPdfBlob(data: Uint8Array): Blob {
  return new Blob([new Uint8Array(data)], { type: PDF_MIME_TYPE });
}

export function toPdfFile(data: Uint8Array, fileName: string): File {
  return new File([new Uint8Array(data)], fileName, { type: PDF_MIME_TYPE });
}
