import * as pdfjsLib from "pdfjs-dist/legacy/build/pdf.mjs";
import type { PDFDocumentProxy } from "pdfjs-dist/legacy/build/pdf.mjs";
import type {
  DisplayScale,
  DocumentHandle,
  FindMatches,
  PDFEngine,
  ViewerHandle,
  ViewerMountOptions,
} from "./types";

/**
 * Read the document title the way the pdf.js viewer does:
 * XMP dc:title wins over the Info dictionary Title.
 */
async function readTitle(pdf: PDFDocumentProxy): Promise<string | null> {
  const { info, metadata } = await pdf.getMetadata();

  const xmpTitle: unknown = metadata?.get("dc:title");
  if (typeof xmpTitle === "string" && xmpTitle.trim()) {
    return xmpTitle.trim();
  }

  const infoDict: unknown = info;
  if (
    typeof infoDict === "object" &&
    infoDict !== null &&
    "Title" in infoDict &&
    typeof infoDict.Title === "string" &&
    infoDict.Title.trim()
  ) {
    return infoDict.Title.trim();
  }

  return null;
}

function readMatches(evt: unknown): FindMatches | null {
  if (typeof evt !== "object" || evt === null || !("matchesCount" in evt)) {
    return null;
  }
  const counts: unknown = evt.matchesCount;
  if (
    typeof counts === "object" &&
    counts !== null &&
    "current" in counts &&
    "total" in counts &&
    typeof counts.current === "number" &&
    typeof counts.total === "number"
  ) {
    return { current: counts.current, total: counts.total };
  }
  return null;
}

function readPageNumber(evt: unknown): number | null {
  if (
    typeof evt === "object" &&
    evt !== null &&
    "pageNumber" in evt &&
    typeof evt.pageNumber === "number"
  ) {
    return evt.pageNumber;
  }
  return null;
}

async function mountPdfjsViewer(
  pdf: PDFDocumentProxy,
  container: HTMLDivElement,
  options: ViewerMountOptions,
): Promise<ViewerHandle> {
  // The viewer components look the core library up on globalThis
  Reflect.set(globalThis, "pdfjsLib", pdfjsLib);
  const viewerLib = await import("pdfjs-dist/legacy/web/pdf_viewer.mjs");

  const viewerEl = document.createElement("div");
  viewerEl.className = "pdfViewer";
  container.replaceChildren(viewerEl);

  const eventBus = new viewerLib.EventBus();
  const linkService = new viewerLib.PDFLinkService({ eventBus });
  const findController = options.findEnabled
    ? new viewerLib.PDFFindController({ eventBus, linkService })
    : undefined;

  const ViewerClass =
    options.displayMode === "single-page"
      ? viewerLib.PDFSinglePageViewer
      : viewerLib.PDFViewer;
  // abortSignal is honoured by the viewer but missing from its typings;
  // aborting it drops the scroll watcher and resize observer
  const lifetime = new AbortController();
  const viewerOptions = {
    container,
    viewer: viewerEl,
    eventBus,
    linkService,
    findController,
    abortSignal: lifetime.signal,
  };
  const viewer = new ViewerClass(viewerOptions);
  linkService.setViewer(viewer);

  const applyScale = (scale: DisplayScale) => {
    if (typeof scale === "number") {
      viewer.currentScale = scale;
    } else {
      viewer.currentScaleValue = scale;
    }
  };

  const onPagesInit = () => applyScale(options.scale);
  const onMatches = (evt: unknown) => {
    const matches = readMatches(evt);
    if (matches) options.onFindMatches?.(matches);
  };
  const onPageChanging = (evt: unknown) => {
    const page = readPageNumber(evt);
    if (page !== null) options.onPageChange?.(page);
  };

  eventBus.on("pagesinit", onPagesInit);
  eventBus.on("updatefindmatchescount", onMatches);
  eventBus.on("updatefindcontrolstate", onMatches);
  eventBus.on("pagechanging", onPageChanging);

  viewer.setDocument(pdf);
  linkService.setDocument(pdf, null);

  let lastQuery = "";

  return {
    find({ query, again = false, previous = false, caseSensitive = false }) {
      if (!findController) return;
      const type = again && query === lastQuery ? "again" : "";
      lastQuery = query;
      eventBus.dispatch("find", {
        source: null,
        type,
        query,
        caseSensitive,
        entireWord: false,
        highlightAll: true,
        findPrevious: previous,
        matchDiacritics: false,
      });
    },
    closeFind() {
      lastQuery = "";
      eventBus.dispatch("findbarclose", { source: null });
    },
    zoomIn() {
      viewer.increaseScale();
    },
    zoomOut() {
      viewer.decreaseScale();
    },
    fitWidth() {
      applyScale("page-width");
    },
    destroy() {
      eventBus.off("pagesinit", onPagesInit);
      eventBus.off("updatefindmatchescount", onMatches);
      eventBus.off("updatefindcontrolstate", onMatches);
      eventBus.off("pagechanging", onPageChanging);
      lifetime.abort();
      linkService.setDocument(null);
      viewer.cleanup();
      container.replaceChildren();
    },
  };
}

export function createPdfjsEngine(): PDFEngine {
  return {
    name: "PDFJS",
    async init({ workerSrc, disableWorker = false } = {}) {
      if (disableWorker || typeof window === "undefined") return;
      pdfjsLib.GlobalWorkerOptions.workerSrc =
        workerSrc ??
        new URL("pdfjs-dist/legacy/build/pdf.worker.mjs", import.meta.url)
          .href;
    },
    async loadDocument(data: Uint8Array): Promise<DocumentHandle> {
      // pdf.js transfers the buffer it is given to its worker; keep the
      // caller's bytes intact for save/share/print
      const task = pdfjsLib.getDocument({
        data: data.slice(),
        disableStream: true,
        disableAutoFetch: true,
        disableRange: true,
        // Callers report load failures themselves
        verbosity: pdfjsLib.VerbosityLevel.ERRORS,
      });
      const pdf = await task.promise;

      return {
        pageCount: () => pdf.numPages,
        getTitle: () => readTitle(pdf),
        mountViewer: (container, options) =>
          mountPdfjsViewer(pdf, container, options),
        destroy() {
          void pdf.destroy();
        },
      };
    },
  };
}
