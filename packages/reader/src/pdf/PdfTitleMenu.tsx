import { ChevronDown, Download, Printer, Share } from "lucide-react";
import { observer } from "mobx-react-lite";
import { useEffect, useRef, useState } from "react";
import type { PdfReaderStore } from "../stores/PdfReaderStore";

const itemClass =
  "w-full flex items-center gap-2 px-3 py-2 text-sm text-left hover:bg-gray-100 disabled:opacity-50";

/**
 * Document title in the top bar; opens a menu with share, save and print.
 */
export const PdfTitleMenu = observer(({ store }: { store: PdfReaderStore }) => {
  const [isOpen, setIsOpen] = useState(false);
  const menuRef = useRef<HTMLDivElement>(null);

  // Close when clicking anywhere outside the menu
  useEffect(() => {
    if (!isOpen) return;
    const handlePointerDown = (e: MouseEvent) => {
      if (e.target instanceof Node && menuRef.current?.contains(e.target)) {
        return;
      }
      setIsOpen(false);
    };
    window.addEventListener("mousedown", handlePointerDown);
    return () => window.removeEventListener("mousedown", handlePointerDown);
  }, [isOpen]);

  const run = (action: () => Promise<unknown>) => {
    setIsOpen(false);
    void action();
  };

  return (
    <div ref={menuRef} className="relative min-w-0">
      <button
        type="button"
        onClick={() => setIsOpen(!isOpen)}
        disabled={!store.hasDocument}
        aria-haspopup="menu"
        aria-expanded={isOpen}
        className="flex items-center gap-1 max-w-full px-2 py-1 rounded font-medium hover:bg-black/5"
      >
        <span className="truncate">{store.title || "Loading…"}</span>
        <ChevronDown className="w-4 h-4 shrink-0" />
      </button>

      {isOpen && (
        <div
          role="menu"
          className="absolute left-0 top-full mt-1 z-30 w-48 bg-white text-gray-900 rounded-lg shadow-lg py-1"
        >
          <button
            type="button"
            role="menuitem"
            onClick={() => run(store.share)}
            disabled={!store.canShare}
            className={itemClass}
          >
            <Share className="w-4 h-4" />
            Share
          </button>
          <button
            type="button"
            role="menuitem"
            onClick={() => run(store.save)}
            disabled={store.isSaveDialogOpen}
            className={itemClass}
          >
            <Download className="w-4 h-4" />
            Save
          </button>
          <button
            type="button"
            role="menuitem"
            onClick={() => run(store.print)}
            className={itemClass}
          >
            <Printer className="w-4 h-4" />
            Print
          </button>
        </div>
      )}
    </div>
  );
});
