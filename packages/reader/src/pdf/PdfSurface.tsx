import { type ViewerHandle, createDisplayOptions } from "@quire/pdf-render";
import { observer } from "mobx-react-lite";
import { useEffect, useRef } from "react";
import type { PdfReaderStore } from "../stores/PdfReaderStore";

/**
 * Hosts the engine's viewer for the store's current document.
 *
 * The engine owns layout, paging, text selection and search highlighting;
 * this component only provides the scroll container and forwards
 * Ctrl/⌘ + wheel (trackpad pinch) as zoom steps.
 */
export const PdfSurface = observer(({ store }: { store: PdfReaderStore }) => {
  const containerRef = useRef<HTMLDivElement>(null);
  const { document, handle } = store;

  useEffect(() => {
    const container = containerRef.current;
    if (!container || !document || !handle) return;

    let cancelled = false;
    let viewer: ViewerHandle | null = null;
    const options = createDisplayOptions(document, store.config);

    handle
      .mountViewer(container, {
        ...options,
        onFindMatches: store.setFindMatches,
        onPageChange: store.setCurrentPage,
      })
      .then((mounted) => {
        if (cancelled) {
          mounted.destroy();
          return;
        }
        viewer = mounted;
        store.attachViewer(mounted);
      })
      .catch((err: unknown) => {
        if (!cancelled) store.setViewerError(err);
      });

    return () => {
      cancelled = true;
      if (viewer) store.detachViewer(viewer);
    };
  }, [store, document, handle]);

  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;

    const handleWheel = (e: WheelEvent) => {
      if (!e.ctrlKey && !e.metaKey) return;
      e.preventDefault();
      if (e.deltaY < 0) {
        store.zoomIn();
      } else if (e.deltaY > 0) {
        store.zoomOut();
      }
    };

    // Non-passive so the browser's own page zoom can be cancelled
    container.addEventListener("wheel", handleWheel, { passive: false });
    return () => container.removeEventListener("wheel", handleWheel);
  }, [store]);

  return (
    <div className="relative flex-1 bg-gray-100">
      {/* The engine's viewer requires an absolutely positioned container */}
      <div
        ref={containerRef}
        data-testid="pdf-surface"
        data-display-mode={
          document?.singlePage ? "single-page" : "continuous"
        }
        className="absolute inset-0 overflow-auto"
      />
    </div>
  );
});
