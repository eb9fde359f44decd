export * from "./engines";
export {
  loadPdfDocument,
  readDocumentTitle,
  deriveTitle,
  fileNameStem,
  ensurePdfExtension,
  sourceFileName,
} from "./DocumentLoader";
export type { LoadOptions, TitleLookup } from "./DocumentLoader";
export {
  DocumentLoadError,
  PDF_MIME_TYPE,
  toPdfBlob,
  toPdfFile,
} from "./PdfDocument";
export type {
  DocumentLoadErrorKind,
  DocumentSource,
  LoadResult,
  PdfDocument,
} from "./PdfDocument";
export { createDisplayOptions } from "./displayOptions";
export { defaultReaderConfig, mergeReaderConfig } from "./ReaderConfig";
export type { ReaderConfig } from "./ReaderConfig";
export { consoleLogger } from "./logger";
export type { Logger } from "./logger";
export {
  detectPlatformCapabilities,
  resetPlatformCapabilities,
  logPlatformCapabilities,
} from "./platformCapabilities";
export type { PlatformCapabilities } from "./platformCapabilities";
export * from "./actions";
