import { ChevronDown, ChevronUp, X } from "lucide-react";
import { observer } from "mobx-react-lite";
import type { KeyboardEvent } from "react";
import type { PdfReaderStore } from "../stores/PdfReaderStore";

function matchLabel(store: PdfReaderStore): string {
  if (!store.findQuery) return "";
  const { current, total } = store.findMatches;
  if (total === 0) return "No matches";
  return `${current} of ${total}`;
}

/**
 * Search overlay. Matching and highlighting happen in the engine; this bar
 * only sends the query and shows the counts it reports back.
 */
export const PdfFindBar = observer(({ store }: { store: PdfReaderStore }) => {
  if (!store.isFindOpen) return null;

  const handleKeyDown = (e: KeyboardEvent<HTMLInputElement>) => {
    switch (e.key) {
      case "Enter":
        e.preventDefault();
        if (e.shiftKey) {
          store.findPrevious();
        } else {
          store.findNext();
        }
        break;
      case "Escape":
        e.preventDefault();
        e.stopPropagation();
        store.setFindOpen(false);
        break;
    }
  };

  return (
    <div
      role="search"
      className="absolute top-2 right-4 z-20 bg-white rounded-lg shadow px-2 py-1 flex items-center gap-1"
    >
      <input
        type="search"
        autoFocus
        aria-label="Find in document"
        placeholder="Find in document"
        value={store.findQuery}
        onChange={(e) => store.find(e.target.value)}
        onKeyDown={handleKeyDown}
        className="w-56 px-2 py-1 text-sm outline-none"
      />
      <span className="text-xs text-gray-500 min-w-[64px] text-right">
        {matchLabel(store)}
      </span>
      <button
        type="button"
        onClick={store.findPrevious}
        disabled={store.findMatches.total === 0}
        className="p-1 rounded hover:bg-gray-100 disabled:opacity-50"
        aria-label="Previous match"
      >
        <ChevronUp className="w-4 h-4" />
      </button>
      <button
        type="button"
        onClick={store.findNext}
        disabled={store.findMatches.total === 0}
        className="p-1 rounded hover:bg-gray-100 disabled:opacity-50"
        aria-label="Next match"
      >
        <ChevronDown className="w-4 h-4" />
      </button>
      <button
        type="button"
        onClick={() => store.setFindOpen(false)}
        className="p-1 rounded hover:bg-gray-100"
        aria-label="Close search"
      >
        <X className="w-4 h-4" />
      </button>
    </div>
  );
});
