import type { DisplayOptions } from "./engines";
import type { PdfDocument } from "./PdfDocument";
import { mergeReaderConfig, type ReaderConfig } from "./ReaderConfig";

/**
 * Display configuration handed to the viewer surface.
 * The document's own single-page flag decides the display mode.
 */
export function createDisplayOptions(
  document: Pick<PdfDocument, "singlePage">,
  config?: Partial<ReaderConfig>,
): DisplayOptions {
  const merged = mergeReaderConfig(config);
  return Object.freeze({
    displayMode: document.singlePage ? "single-page" : "continuous",
    scale: merged.scale,
    findEnabled: merged.findEnabled,
  });
}
