import { Search, Share, ZoomIn, ZoomOut } from "lucide-react";
import { observer } from "mobx-react-lite";
import type { PdfReaderStore } from "../stores/PdfReaderStore";

const buttonClass =
  "p-2 rounded text-sm font-medium disabled:opacity-50 disabled:cursor-not-allowed hover:bg-black/5";

/**
 * Bottom bar: share, search toggle, zoom and the page indicator.
 */
export const PdfActionBar = observer(({ store }: { store: PdfReaderStore }) => {
  const disabled = !store.hasDocument;

  return (
    <div className="flex items-center justify-between px-3 py-1 border-t border-black/10 bg-[var(--reader-bar-bg)] text-[var(--reader-bar-fg)]">
      <button
        type="button"
        onClick={() => void store.share()}
        disabled={disabled || !store.canShare}
        className={buttonClass}
        aria-label="Share"
      >
        <Share className="w-5 h-5" />
      </button>

      <div className="flex items-center gap-1">
        <button
          type="button"
          onClick={store.zoomOut}
          disabled={disabled}
          className={buttonClass}
          aria-label="Zoom out"
        >
          <ZoomOut className="w-5 h-5" />
        </button>
        <span className="text-sm min-w-[72px] text-center tabular-nums">
          {store.pageCount > 0 ? `${store.currentPage} / ${store.pageCount}` : ""}
        </span>
        <button
          type="button"
          onClick={store.zoomIn}
          disabled={disabled}
          className={buttonClass}
          aria-label="Zoom in"
        >
          <ZoomIn className="w-5 h-5" />
        </button>
      </div>

      <button
        type="button"
        onClick={store.toggleFind}
        disabled={disabled || !store.config.findEnabled}
        aria-pressed={store.isFindOpen}
        className={`${buttonClass} ${store.isFindOpen ? "text-[var(--reader-accent)]" : ""}`}
        aria-label="Search"
      >
        <Search className="w-5 h-5" />
      </button>
    </div>
  );
});
