import { useEffect, type RefObject } from "react";
import type { PdfReaderStore } from "../stores/PdfReaderStore";

interface UseKeyboardShortcutsOptions {
  store: PdfReaderStore;
  containerRef: RefObject<HTMLDivElement | null>;
}

/**
 * Keyboard shortcuts for the reader shell
 *
 * SHORTCUTS:
 * - Ctrl/⌘+F : Toggle search
 * - Ctrl/⌘+S : Save
 * - Ctrl/⌘+P : Print
 * - Escape   : Close search, or leave the reader
 * - +/=      : Zoom in
 * - -/_      : Zoom out
 * - 0        : Fit to width
 *
 * REQUIREMENTS:
 * - Container must be focused (tabindex="0")
 * - Unmodified keys are ignored while focus is in an input/textarea
 */
export function useKeyboardShortcuts({
  store,
  containerRef,
}: UseKeyboardShortcutsOptions) {
  useEffect(() => {
    if (!containerRef.current) return;

    const handleKeyDown = (e: KeyboardEvent) => {
      if (e.ctrlKey || e.metaKey) {
        switch (e.key.toLowerCase()) {
          case "f":
            e.preventDefault();
            store.toggleFind();
            break;
          case "s":
            e.preventDefault();
            void store.save();
            break;
          case "p":
            e.preventDefault();
            void store.print();
            break;
        }
        return;
      }

      if (
        e.target instanceof HTMLInputElement ||
        e.target instanceof HTMLTextAreaElement
      ) {
        return;
      }

      switch (e.key) {
        case "Escape":
          e.preventDefault();
          if (store.isFindOpen) {
            store.setFindOpen(false);
          } else {
            store.dismiss();
          }
          break;
        case "+":
        case "=":
          e.preventDefault();
          store.zoomIn();
          break;
        case "-":
        case "_":
          e.preventDefault();
          store.zoomOut();
          break;
        case "0":
          e.preventDefault();
          store.fitWidth();
          break;
      }
    };

    const container = containerRef.current;
    container.addEventListener("keydown", handleKeyDown);

    // Make container focusable to receive keyboard events
    if (!container.hasAttribute("tabindex")) {
      container.setAttribute("tabindex", "0");
    }

    return () => {
      container.removeEventListener("keydown", handleKeyDown);
    };
  }, [store, containerRef]);
}
