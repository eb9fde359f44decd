/**
 * Browser implementations of the platform targets:
 * - share: Web Share API
 * - save: File System Access save picker, else an anchor download
 * - print: a hidden frame on an object URL
 */

import { toPdfBlob } from "../PdfDocument";
import type {
  ActionResult,
  PrintTarget,
  SaveTarget,
  ShareTarget,
} from "./types";

interface WritableFileStream {
  write(data: Blob): Promise<void>;
  close(): Promise<void>;
}

interface SaveFileHandle {
  readonly name: string;
  createWritable(): Promise<WritableFileStream>;
}

interface SaveFilePickerOptions {
  suggestedName?: string;
  types?: Array<{ description?: string; accept: Record<string, string[]> }>;
}

export type SaveFilePicker = (
  options: SaveFilePickerOptions,
) => Promise<SaveFileHandle>;

export interface ObjectUrls {
  createObjectURL(blob: Blob): string;
  revokeObjectURL(url: string): void;
}

export interface BrowserSaveHost extends ObjectUrls {
  document: Document;
  showSaveFilePicker?: SaveFilePicker;
}

export interface BrowserPrintHost extends ObjectUrls {
  document: Document;
}

export interface BrowserShareHost {
  share?: (data: ShareData) => Promise<void>;
  canShare?: (data?: ShareData) => boolean;
}

const objectUrls: ObjectUrls = {
  createObjectURL: (blob) => URL.createObjectURL(blob),
  revokeObjectURL: (url) => URL.revokeObjectURL(url),
};

function isAbortError(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "name" in err &&
    err.name === "AbortError"
  );
}

function failure(err: unknown): ActionResult {
  return {
    status: "failed",
    message: err instanceof Error ? err.message : String(err),
  };
}

export function createBrowserShareTarget(
  host: BrowserShareHost = navigator,
): ShareTarget {
  return {
    async share(payload) {
      if (!host.share) return { status: "unsupported" };
      if (
        payload.files &&
        (!host.canShare || !host.canShare({ files: payload.files }))
      ) {
        return { status: "unsupported" };
      }
      try {
        await host.share({
          title: payload.title,
          url: payload.url,
          files: payload.files,
        });
        return { status: "completed" };
      } catch (err) {
        if (isAbortError(err)) return { status: "cancelled" };
        return failure(err);
      }
    },
  };
}

function defaultSaveHost(): BrowserSaveHost {
  const win: Window & { showSaveFilePicker?: SaveFilePicker } = window;
  return {
    ...objectUrls,
    document: win.document,
    showSaveFilePicker: win.showSaveFilePicker?.bind(win),
  };
}

function downloadBlob(host: BrowserSaveHost, blob: Blob, name: string) {
  const url = host.createObjectURL(blob);
  const link = host.document.createElement("a");
  link.href = url;
  link.download = name;
  link.rel = "noopener";
  host.document.body.appendChild(link);
  link.click();
  link.remove();
  setTimeout(() => host.revokeObjectURL(url), 0);
}

export function createBrowserSaveTarget(
  host: BrowserSaveHost = defaultSaveHost(),
): SaveTarget {
  return {
    async save({ suggestedName, mimeType, data }) {
      const blob = toPdfBlob(data);

      if (host.showSaveFilePicker) {
        try {
          const handle = await host.showSaveFilePicker({
            suggestedName,
            types: [
              { description: "PDF document", accept: { [mimeType]: [".pdf"] } },
            ],
          });
          const writable = await handle.createWritable();
          await writable.write(blob);
          await writable.close();
          return { status: "completed", destination: handle.name };
        } catch (err) {
          if (isAbortError(err)) return { status: "cancelled" };
          return failure(err);
        }
      }

      try {
        downloadBlob(host, blob, suggestedName);
        return { status: "completed", destination: suggestedName };
      } catch (err) {
        return failure(err);
      }
    },
  };
}

// Upper bound on how long the print frame outlives a dialog that never
// reports afterprint
const PRINT_FRAME_TTL_MS = 60_000;

export function createBrowserPrintTarget(
  host: BrowserPrintHost = { ...objectUrls, document },
): PrintTarget {
  return {
    print(job) {
      const doc = host.document;
      const url = host.createObjectURL(toPdfBlob(job.data));
      const frame = doc.createElement("iframe");
      frame.title = job.jobName;
      frame.style.cssText =
        "position:fixed;right:0;bottom:0;width:0;height:0;border:0;";

      const previousTitle = doc.title;
      let timer: ReturnType<typeof setTimeout> | undefined;
      let removed = false;
      const cleanup = () => {
        if (removed) return;
        removed = true;
        if (timer !== undefined) clearTimeout(timer);
        doc.title = previousTitle;
        frame.remove();
        host.revokeObjectURL(url);
      };

      return new Promise<ActionResult>((resolve) => {
        frame.addEventListener(
          "load",
          () => {
            const win = frame.contentWindow;
            if (!win) {
              cleanup();
              resolve({ status: "failed", message: "Print frame unavailable" });
              return;
            }
            // Best effort: only browsers that name the job after the top
            // document pick this up. It stays until the frame is cleaned up.
            doc.title = job.jobName;
            timer = setTimeout(cleanup, PRINT_FRAME_TTL_MS);
            try {
              win.addEventListener("afterprint", cleanup, { once: true });
              win.focus();
              win.print();
              resolve({ status: "completed" });
            } catch (err) {
              cleanup();
              resolve(failure(err));
            }
          },
          { once: true },
        );
        frame.src = url;
        doc.body.appendChild(frame);
      });
    },
  };
}
