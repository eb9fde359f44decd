/**
 * Detect which platform services the action bar can hand work to:
 * - Web Share API (with file payloads)
 * - File System Access save picker
 * - Print through a hidden frame
 */

export interface PlatformCapabilities {
  canShare: boolean;
  canShareFiles: boolean;
  hasSavePicker: boolean;
  canPrint: boolean;
}

let cachedResult: PlatformCapabilities | null = null;

export function detectPlatformCapabilities(): PlatformCapabilities {
  if (cachedResult) return cachedResult;

  if (typeof window === "undefined" || typeof navigator === "undefined") {
    cachedResult = {
      canShare: false,
      canShareFiles: false,
      hasSavePicker: false,
      canPrint: false,
    };
    return cachedResult;
  }

  const canShare = typeof navigator.share === "function";

  let canShareFiles = false;
  if (canShare && typeof navigator.canShare === "function") {
    try {
      const sample = new File([new Uint8Array(0)], "sample.pdf", {
        type: "application/pdf",
      });
      canShareFiles = navigator.canShare({ files: [sample] });
    } catch {
      canShareFiles = false;
    }
  }

  const hasSavePicker = "showSaveFilePicker" in window;
  const canPrint = typeof window.print === "function";

  cachedResult = { canShare, canShareFiles, hasSavePicker, canPrint };
  return cachedResult;
}

/** Forget the cached detection (capabilities can change under test). */
export function resetPlatformCapabilities(): void {
  cachedResult = null;
}

export function logPlatformCapabilities(): void {
  const caps = detectPlatformCapabilities();
  console.log("[Capabilities] Platform services:", {
    share: caps.canShare,
    shareFiles: caps.canShareFiles,
    savePicker: caps.hasSavePicker,
    print: caps.canPrint,
  });
}
