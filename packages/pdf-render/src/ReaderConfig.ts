import type { DisplayScale } from "./engines";

/**
 * Configuration options for the reader shell.
 */
export interface ReaderConfig {
  /**
   * Show one page at a time instead of a continuous scroll.
   *
   * @default false
   */
  singlePage: boolean;

  /**
   * Scale applied once the engine has laid out the pages.
   * "page-width" fits the page to the container width.
   *
   * @default "page-width"
   */
  scale: DisplayScale;

  /**
   * Whether the find-in-document overlay can be opened.
   *
   * @default true
   */
  findEnabled: boolean;

  /**
   * Title used when a source has neither a metadata title nor a filename.
   *
   * @default "Untitled"
   */
  untitledTitle: string;

  /**
   * Fall back to the document's display title as the print job name when
   * the bytes carry no metadata title. When false, printing such a
   * document is aborted and logged.
   *
   * @default true
   */
  printFallbackToDisplayTitle: boolean;

  /**
   * Log loader and action activity to the console.
   *
   * @default false
   */
  debug?: boolean;
}

/**
 * Default configuration for the reader shell.
 */
export const defaultReaderConfig: ReaderConfig = {
  singlePage: false,
  scale: "page-width",
  findEnabled: true,
  untitledTitle: "Untitled",
  printFallbackToDisplayTitle: true,
  debug: false,
};

/**
 * Merge user configuration with defaults.
 *
 * @param userConfig - Partial configuration to override defaults
 * @returns Complete configuration with defaults filled in
 */
export function mergeReaderConfig(
  userConfig?: Partial<ReaderConfig>,
): ReaderConfig {
  return {
    ...defaultReaderConfig,
    ...userConfig,
  };
}
