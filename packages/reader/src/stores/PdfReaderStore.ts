import {
  type ActionKind,
  type ActionResult,
  type DocumentHandle,
  type DocumentSource,
  type EngineInitOptions,
  type FindMatches,
  type Logger,
  type PDFEngine,
  type PdfDocument,
  type PlatformCapabilities,
  type PrintTarget,
  type ReaderConfig,
  type SaveTarget,
  type ShareTarget,
  type ViewerHandle,
  consoleLogger,
  createBrowserPrintTarget,
  createBrowserSaveTarget,
  createBrowserShareTarget,
  detectPlatformCapabilities,
  loadPdfDocument,
  mergeReaderConfig,
  printPdf,
  readDocumentTitle,
  savePdf,
  sharePdf,
} from "@quire/pdf-render";
import { makeAutoObservable, observable, runInAction } from "mobx";

export interface ReaderTargets {
  share?: ShareTarget;
  save?: SaveTarget;
  print?: PrintTarget;
}

export interface PdfReaderStoreDeps {
  engine: PDFEngine;
  engineOptions?: EngineInitOptions;
  /** Platform dialogs; the browser ones are used for any left out. */
  targets?: ReaderTargets;
  /** What the platform offers; detected when left out. */
  capabilities?: PlatformCapabilities;
  config?: Partial<ReaderConfig>;
  logger?: Logger;
  fetch?: typeof fetch;
  /** Called once the reader has been dismissed and torn down. */
  onDismiss?: () => void;
}

export interface LoadRequest {
  singlePage?: boolean;
}

export interface ReaderNotice {
  kind: ActionKind;
  tone: "info" | "error";
  message: string;
}

const NO_MATCHES: FindMatches = { current: 0, total: 0 };

const UNSUPPORTED_MESSAGES: Record<ActionKind, string> = {
  share: "Sharing is not available in this browser",
  save: "Saving is not available in this browser",
  print: "Printing is not available in this browser",
};

/**
 * State for one reader session: the loaded document, the engine handle
 * behind it, and the shell's UI flags.
 *
 * The viewer mounted by PdfSurface is attached here so that search and
 * zoom can be driven from the toolbar and keyboard. Every `load()` bumps a
 * generation counter; a load that finishes after a newer one (or after
 * `dispose()`) releases its handle and leaves the state alone.
 */
export class PdfReaderStore {
  document: PdfDocument | null = null;
  handle: DocumentHandle | null = null;
  isLoading = false;
  error: string | null = null;

  isFindOpen = false;
  findQuery = "";
  findMatches: FindMatches = NO_MATCHES;

  isSaveDialogOpen = false;
  isDismissed = false;
  notice: ReaderNotice | null = null;

  currentPage = 1;

  readonly config: ReaderConfig;
  /** Share is offered when a share target was given or the browser has one. */
  readonly canShare: boolean;

  private viewer: ViewerHandle | null = null;
  private loadGen = 0;
  private engineReady: Promise<void> | null = null;
  private targets: ReaderTargets;
  private logger: Logger;

  constructor(private deps: PdfReaderStoreDeps) {
    this.config = mergeReaderConfig(deps.config);
    this.targets = { ...deps.targets };
    this.logger = deps.logger ?? consoleLogger;
    this.canShare =
      deps.targets?.share !== undefined ||
      (deps.capabilities ?? detectPlatformCapabilities()).canShare;

    makeAutoObservable<
      PdfReaderStore,
      "deps" | "viewer" | "loadGen" | "engineReady" | "targets" | "logger"
    >(
      this,
      {
        // Frozen record and engine objects are stored as-is
        document: observable.ref,
        handle: observable.ref,
        findMatches: observable.ref,
        config: false,
        canShare: false,
        deps: false,
        viewer: false,
        loadGen: false,
        engineReady: false,
        targets: false,
        logger: false,
      },
      { autoBind: true },
    );
  }

  get pageCount(): number {
    return this.handle?.pageCount() ?? 0;
  }

  get title(): string {
    return this.document?.title ?? "";
  }

  get hasDocument(): boolean {
    return this.document !== null;
  }

  private ensureEngine(): Promise<void> {
    if (!this.engineReady) {
      this.engineReady = this.deps.engine
        .init(this.deps.engineOptions)
        .catch((err: unknown) => {
          this.engineReady = null;
          throw err;
        });
    }
    return this.engineReady;
  }

  /**
   * Load a document, replacing whatever is open. Failures land in `error`;
   * a later `load()` starts over.
   */
  async load(source: DocumentSource, request: LoadRequest = {}) {
    this.releaseDocument();
    const gen = ++this.loadGen;

    runInAction(() => {
      this.isLoading = true;
      this.error = null;
      this.isDismissed = false;
      this.notice = null;
    });

    try {
      await this.ensureEngine();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error("[PdfReaderStore] Engine init failed:", message);
      if (gen !== this.loadGen) return;
      runInAction(() => {
        this.error = message;
        this.isLoading = false;
      });
      return;
    }

    const result = await loadPdfDocument(source, {
      engine: this.deps.engine,
      singlePage: request.singlePage,
      config: this.config,
      fetch: this.deps.fetch,
      logger: this.logger,
    });

    if (gen !== this.loadGen) {
      if (result.ok) result.handle.destroy();
      if (this.config.debug) {
        this.logger.log("[PdfReaderStore] Discarding superseded load");
      }
      return;
    }

    runInAction(() => {
      if (result.ok) {
        this.document = result.document;
        this.handle = result.handle;
        this.currentPage = 1;
      } else {
        this.error = result.error.message;
      }
      this.isLoading = false;
    });
  }

  // ═══════════════════════════════════════════════════════════════
  // VIEWER
  // ═══════════════════════════════════════════════════════════════

  attachViewer(viewer: ViewerHandle) {
    if (this.viewer && this.viewer !== viewer) this.viewer.destroy();
    this.viewer = viewer;
  }

  /** Tear down the attached viewer, or only `viewer` if given. */
  detachViewer(viewer?: ViewerHandle) {
    if (!this.viewer) return;
    if (viewer && viewer !== this.viewer) return;
    this.viewer.destroy();
    this.viewer = null;
  }

  setViewerError(err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    this.logger.error("[PdfReaderStore] Viewer failed:", message);
    this.error = message;
  }

  setCurrentPage(page: number) {
    this.currentPage = page;
  }

  zoomIn() {
    this.viewer?.zoomIn();
  }

  zoomOut() {
    this.viewer?.zoomOut();
  }

  fitWidth() {
    this.viewer?.fitWidth();
  }

  // ═══════════════════════════════════════════════════════════════
  // FIND
  // ═══════════════════════════════════════════════════════════════

  toggleFind() {
    this.setFindOpen(!this.isFindOpen);
  }

  setFindOpen(open: boolean) {
    if (open && !this.config.findEnabled) return;
    if (open === this.isFindOpen) return;
    this.isFindOpen = open;
    if (!open) {
      this.viewer?.closeFind();
      this.findQuery = "";
      this.findMatches = NO_MATCHES;
    }
  }

  find(query: string) {
    this.findQuery = query;
    if (!query) {
      this.viewer?.closeFind();
      this.findMatches = NO_MATCHES;
      return;
    }
    this.viewer?.find({ query });
  }

  findNext() {
    if (!this.findQuery) return;
    this.viewer?.find({ query: this.findQuery, again: true });
  }

  findPrevious() {
    if (!this.findQuery) return;
    this.viewer?.find({ query: this.findQuery, again: true, previous: true });
  }

  setFindMatches(matches: FindMatches) {
    this.findMatches = matches;
  }

  // ═══════════════════════════════════════════════════════════════
  // ACTIONS
  // ═══════════════════════════════════════════════════════════════

  // Browser targets are created on first use so that tests and non-browser
  // hosts never touch navigator or window
  private shareTarget(): ShareTarget {
    this.targets.share ??= createBrowserShareTarget();
    return this.targets.share;
  }

  private saveTarget(): SaveTarget {
    this.targets.save ??= createBrowserSaveTarget();
    return this.targets.save;
  }

  private printTarget(): PrintTarget {
    this.targets.print ??= createBrowserPrintTarget();
    return this.targets.print;
  }

  async share(): Promise<ActionResult | null> {
    const doc = this.document;
    if (!doc) return null;
    const result = await sharePdf(
      {
        data: doc.data,
        title: doc.title,
        fileName: doc.fileName,
        source: doc.source,
      },
      { target: this.shareTarget(), logger: this.logger },
    );
    this.report("share", result);
    return result;
  }

  async save(): Promise<ActionResult | null> {
    const doc = this.document;
    if (!doc || this.isSaveDialogOpen) return null;

    this.isSaveDialogOpen = true;
    let result: ActionResult;
    try {
      result = await savePdf(doc.data, doc.fileName, {
        target: this.saveTarget(),
        logger: this.logger,
      });
    } finally {
      runInAction(() => {
        this.isSaveDialogOpen = false;
      });
    }
    this.report("save", result, doc.fileName);
    return result;
  }

  async print(): Promise<ActionResult | null> {
    const doc = this.document;
    if (!doc) return null;
    const engine = this.deps.engine;
    const result = await printPdf(doc.data, {
      target: this.printTarget(),
      resolveTitle: (data) => readDocumentTitle(engine, data),
      fallbackJobName: this.config.printFallbackToDisplayTitle
        ? doc.title
        : undefined,
      logger: this.logger,
    });
    this.report("print", result);
    return result;
  }

  private report(kind: ActionKind, result: ActionResult, fileName?: string) {
    switch (result.status) {
      case "failed":
        this.notice = { kind, tone: "error", message: result.message };
        break;
      case "unsupported":
        this.notice = {
          kind,
          tone: "error",
          message: UNSUPPORTED_MESSAGES[kind],
        };
        break;
      case "completed":
        if (kind === "save") {
          this.notice = {
            kind,
            tone: "info",
            message: `Saved ${result.destination ?? fileName ?? ""}`.trim(),
          };
        }
        break;
      case "cancelled":
        break;
    }
  }

  clearNotice() {
    this.notice = null;
  }

  // ═══════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════

  /** Leave the reader: tear everything down and tell the host. */
  dismiss() {
    if (this.isDismissed) return;
    this.dispose();
    this.isDismissed = true;
    this.deps.onDismiss?.();
  }

  dispose() {
    if (this.config.debug) {
      this.logger.log("[PdfReaderStore] dispose() called");
    }
    // Invalidate any load still in flight
    this.loadGen++;
    this.releaseDocument();
    this.isLoading = false;
    this.error = null;
    this.notice = null;
  }

  private releaseDocument() {
    this.detachViewer();
    this.handle?.destroy();
    this.handle = null;
    this.document = null;
    this.currentPage = 1;
    this.isFindOpen = false;
    this.findQuery = "";
    this.findMatches = NO_MATCHES;
    this.isSaveDialogOpen = false;
  }
}
