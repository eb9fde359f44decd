import type { DocumentHandle, PDFEngine } from "./engines";
import { consoleLogger, type Logger } from "./logger";
import {
  DocumentLoadError,
  type DocumentSource,
  type LoadResult,
  type PdfDocument,
} from "./PdfDocument";
import { mergeReaderConfig, type ReaderConfig } from "./ReaderConfig";

export interface LoadOptions {
  engine: PDFEngine;
  singlePage?: boolean;
  config?: Partial<ReaderConfig>;
  fetch?: typeof fetch;
  logger?: Logger;
}

/**
 * Strip the directory, query, hash and last extension from a filename or
 * URL path. A dot-file such as ".pdf" has no extension and is kept whole.
 */
export function fileNameStem(name: string): string {
  const path = name.split(/[?#]/, 1)[0] ?? "";
  const segment = path.split(/[\\/]/).filter(Boolean).pop() ?? "";
  let decoded: string;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    decoded = segment;
  }
  const dot = decoded.lastIndexOf(".");
  return dot > 0 ? decoded.slice(0, dot) : decoded;
}

export function ensurePdfExtension(name: string): string {
  return name.toLowerCase().endsWith(".pdf") ? name : `${name}.pdf`;
}

/**
 * Filename carried by a source, if any. blob: and data: URLs have none.
 */
export function sourceFileName(source: DocumentSource): string | null {
  switch (source.kind) {
    case "url":
      if (/^(blob|data):/i.test(source.url)) return null;
      return source.url;
    case "file": {
      const file = source.file;
      if ("name" in file && typeof file.name === "string" && file.name) {
        return file.name;
      }
      return null;
    }
    case "bytes":
      return source.name ?? null;
  }
}

async function readSourceBytes(
  source: DocumentSource,
  fetchImpl: typeof fetch,
): Promise<Uint8Array> {
  switch (source.kind) {
    case "bytes":
      return source.data;
    case "file":
      return new Uint8Array(await source.file.arrayBuffer());
    case "url": {
      const res = await fetchImpl(source.url);
      if (!res.ok) {
        throw new Error(`HTTP ${res.status} fetching ${source.url}`);
      }
      return new Uint8Array(await res.arrayBuffer());
    }
  }
}

/**
 * Title shown for a document: the metadata title when present, otherwise
 * the filename stem, otherwise the configured untitled label.
 */
export function deriveTitle(
  metadataTitle: string | null,
  source: DocumentSource,
  untitledTitle: string,
): string {
  const trimmed = metadataTitle?.trim();
  if (trimmed) return trimmed;
  const fileName = sourceFileName(source);
  const stem = fileName ? fileNameStem(fileName) : "";
  return stem || untitledTitle;
}

async function safeTitle(
  handle: DocumentHandle,
  logger: Logger,
): Promise<string | null> {
  try {
    return await handle.getTitle();
  } catch (err) {
    logger.warn("[DocumentLoader] Failed to read metadata title:", err);
    return null;
  }
}

/**
 * Read a document from its source and open it with the engine.
 *
 * Failures never throw: unreadable sources resolve `{ ok: false }` with a
 * "read" error, bytes the engine rejects with a "parse" error. The caller
 * owns the returned handle and must destroy it.
 */
export async function loadPdfDocument(
  source: DocumentSource,
  options: LoadOptions,
): Promise<LoadResult> {
  const config = mergeReaderConfig(options.config);
  const logger = options.logger ?? consoleLogger;
  const fetchImpl = options.fetch ?? globalThis.fetch;

  let data: Uint8Array;
  try {
    data = await readSourceBytes(source, fetchImpl);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error("[DocumentLoader] Failed to read document:", message);
    return {
      ok: false,
      error: new DocumentLoadError("read", message, err),
    };
  }

  if (data.byteLength === 0) {
    logger.error("[DocumentLoader] Document is empty");
    return {
      ok: false,
      error: new DocumentLoadError("read", "Document is empty"),
    };
  }

  let handle: DocumentHandle;
  try {
    handle = await options.engine.loadDocument(data);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error("[DocumentLoader] Failed to parse document:", message);
    return {
      ok: false,
      error: new DocumentLoadError("parse", message, err),
    };
  }

  const title = deriveTitle(
    await safeTitle(handle, logger),
    source,
    config.untitledTitle,
  );

  const document: PdfDocument = Object.freeze({
    data,
    title,
    fileName: ensurePdfExtension(title),
    singlePage: options.singlePage ?? config.singlePage,
    source,
  });

  if (config.debug) {
    logger.log(
      `[DocumentLoader] Loaded "${title}" (${data.byteLength} bytes, ${handle.pageCount()} pages)`,
    );
  }

  return { ok: true, document, handle };
}

export interface TitleLookup {
  title: string | null;
  /** Why the bytes could not be read, when they could not. */
  error?: string;
}

/**
 * Recover the metadata title from raw bytes. `title` is null when the
 * bytes do not parse or carry no title; `error` says which.
 */
export async function readDocumentTitle(
  engine: PDFEngine,
  data: Uint8Array,
): Promise<TitleLookup> {
  let handle: DocumentHandle;
  try {
    handle = await engine.loadDocument(data);
  } catch (err) {
    return {
      title: null,
      error: err instanceof Error ? err.message : String(err),
    };
  }
  try {
    const title = await handle.getTitle();
    return { title: title?.trim() || null };
  } catch (err) {
    return {
      title: null,
      error: err instanceof Error ? err.message : String(err),
    };
  } finally {
    handle.destroy();
  }
}
