import type { DocumentSource } from "@quire/pdf-render";
import { X } from "lucide-react";
import { observer } from "mobx-react-lite";
import { useEffect, useRef, useState } from "react";
import {
  PdfReaderStore,
  type PdfReaderStoreDeps,
} from "../stores/PdfReaderStore";
import { PdfActionBar } from "./PdfActionBar";
import { PdfFindBar } from "./PdfFindBar";
import { PdfSurface } from "./PdfSurface";
import { PdfTitleMenu } from "./PdfTitleMenu";
import { useKeyboardShortcuts } from "./useKeyboardShortcuts";

const NOTICE_TIMEOUT_MS = 4000;

export interface PdfReaderProps extends PdfReaderStoreDeps {
  /** Keep this referentially stable; a new object reloads the document. */
  source: DocumentSource;
  singlePage?: boolean;
}

const Notice = observer(({ store }: { store: PdfReaderStore }) => {
  const notice = store.notice;

  useEffect(() => {
    if (!notice) return;
    const timer = window.setTimeout(store.clearNotice, NOTICE_TIMEOUT_MS);
    return () => window.clearTimeout(timer);
  }, [store, notice]);

  if (!notice) return null;

  return (
    <div
      role={notice.tone === "error" ? "alert" : "status"}
      className={`absolute bottom-4 left-1/2 -translate-x-1/2 z-20 rounded-lg shadow px-4 py-2 text-sm ${
        notice.tone === "error"
          ? "bg-red-50 text-red-700"
          : "bg-white text-gray-700"
      }`}
    >
      {notice.message}
    </div>
  );
});

const ReaderBody = observer(({ store }: { store: PdfReaderStore }) => {
  if (store.isLoading) {
    return (
      <div className="flex-1 flex items-center justify-center text-gray-500">
        Loading PDF…
      </div>
    );
  }

  if (store.error) {
    return (
      <div className="flex-1 flex items-center justify-center text-red-500">
        Error: {store.error}
      </div>
    );
  }

  return <PdfSurface store={store} />;
});

/**
 * Full-screen PDF reader: title menu and Done in the top bar, the engine's
 * viewer in the middle, share/search/zoom at the bottom.
 *
 * The reader owns its store for its lifetime and disposes it on unmount.
 * `setupReaderAppearance()` is expected to have been called by the host.
 */
export const PdfReader = observer(
  ({ source, singlePage, onDismiss, ...deps }: PdfReaderProps) => {
    const onDismissRef = useRef(onDismiss);
    onDismissRef.current = onDismiss;

    const [store] = useState(
      () =>
        new PdfReaderStore({
          ...deps,
          onDismiss: () => onDismissRef.current?.(),
        }),
    );
    const containerRef = useRef<HTMLDivElement>(null);

    useKeyboardShortcuts({ store, containerRef });

    useEffect(() => {
      void store.load(source, { singlePage });
    }, [store, source, singlePage]);

    useEffect(() => {
      return () => {
        store.dispose();
      };
    }, [store]);

    if (store.isDismissed) return null;

    return (
      <div
        ref={containerRef}
        className="h-screen flex flex-col relative outline-none"
      >
        <div className="flex items-center justify-between gap-2 px-3 py-1 border-b border-black/10 bg-[var(--reader-bar-bg)] text-[var(--reader-bar-fg)]">
          <PdfTitleMenu store={store} />
          <button
            type="button"
            onClick={store.dismiss}
            className="flex items-center gap-1 px-3 py-1 rounded text-sm font-semibold text-[var(--reader-accent)] hover:bg-black/5"
          >
            <X className="w-4 h-4" />
            Done
          </button>
        </div>

        <div className="relative flex-1 flex flex-col min-h-0">
          <PdfFindBar store={store} />
          <ReaderBody store={store} />
          <Notice store={store} />
        </div>

        <PdfActionBar store={store} />
      </div>
    );
  },
);
