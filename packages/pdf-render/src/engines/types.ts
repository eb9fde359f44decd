export interface EngineInitOptions {
  workerSrc?: string;
  disableWorker?: boolean;
}

export type DisplayMode = "continuous" | "single-page";

/**
 * Scale applied once the engine has laid out its pages.
 * Named values follow the engine's own presets; a number is an absolute zoom.
 */
export type DisplayScale = "page-width" | "page-fit" | "auto" | number;

export interface DisplayOptions {
  displayMode: DisplayMode;
  scale: DisplayScale;
  findEnabled: boolean;
}

export interface FindMatches {
  current: number; // 1-based, 0 when nothing is selected
  total: number;
}

export interface FindQuery {
  query: string;
  again?: boolean; // step to the next match of an unchanged query
  previous?: boolean;
  caseSensitive?: boolean;
}

export interface ViewerMountOptions extends DisplayOptions {
  onFindMatches?: (matches: FindMatches) => void;
  onPageChange?: (pageNumber: number) => void;
}

/**
 * A live engine viewer mounted into a host element.
 * Search, pagination and zoom all happen inside the engine.
 */
export interface ViewerHandle {
  find(query: FindQuery): void;
  closeFind(): void;
  zoomIn(): void;
  zoomOut(): void;
  fitWidth(): void;
  destroy(): void;
}

export interface DocumentHandle {
  pageCount(): number;
  /** Embedded metadata title, or null when the document has none. */
  getTitle(): Promise<string | null>;
  mountViewer(
    container: HTMLDivElement,
    options: ViewerMountOptions,
  ): Promise<ViewerHandle>;
  destroy(): void;
}

export interface PDFEngine {
  readonly name: string;
  init(opts?: EngineInitOptions): Promise<void>;
  loadDocument(data: Uint8Array): Promise<DocumentHandle>;
}
