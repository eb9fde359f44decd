import { ensurePdfExtension } from "../DocumentLoader";
import { consoleLogger, type Logger } from "../logger";
import { PDF_MIME_TYPE } from "../PdfDocument";
import type { ActionResult, SaveRequest, SaveTarget } from "./types";

export interface SaveDeps {
  target: SaveTarget;
  logger?: Logger;
}

export function buildSaveRequest(
  data: Uint8Array,
  fileName: string,
): SaveRequest {
  return {
    suggestedName: ensurePdfExtension(fileName),
    mimeType: PDF_MIME_TYPE,
    data,
  };
}

/**
 * Hand the unmodified bytes to the file-export dialog under `fileName`.pdf.
 * The outcome is logged and returned; there is no retry.
 */
export async function savePdf(
  data: Uint8Array,
  fileName: string,
  deps: SaveDeps,
): Promise<ActionResult> {
  const logger = deps.logger ?? consoleLogger;
  const request = buildSaveRequest(data, fileName);

  let result: ActionResult;
  try {
    result = await deps.target.save(request);
  } catch (err) {
    result = {
      status: "failed",
      message: err instanceof Error ? err.message : String(err),
    };
  }

  switch (result.status) {
    case "completed":
      logger.log(
        `[SaveAction] Saved to ${result.destination ?? request.suggestedName}`,
      );
      break;
    case "failed":
      logger.error(`[SaveAction] Save failed: ${result.message}`);
      break;
    case "cancelled":
      logger.log("[SaveAction] Save cancelled");
      break;
    case "unsupported":
      logger.warn("[SaveAction] Saving is not available on this platform");
      break;
  }
  return result;
}
