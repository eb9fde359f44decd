import { ensurePdfExtension } from "../DocumentLoader";
import { consoleLogger, type Logger } from "../logger";
import { toPdfFile } from "../PdfDocument";
import type {
  ActionResult,
  ShareInput,
  SharePayload,
  ShareTarget,
} from "./types";

export interface ShareDeps {
  target: ShareTarget;
  logger?: Logger;
}

/**
 * Build what the share sheet receives. Remote documents are shared by
 * link; anything else (local files, in-memory bytes, blob: URLs) as a file.
 */
export function buildSharePayload(input: ShareInput): SharePayload {
  const { source } = input;
  if (source.kind === "url" && /^https?:/i.test(source.url)) {
    return { title: input.title, url: source.url };
  }
  const file = toPdfFile(input.data, ensurePdfExtension(input.fileName));
  return { title: input.title, files: [file] };
}

export async function sharePdf(
  input: ShareInput,
  deps: ShareDeps,
): Promise<ActionResult> {
  const logger = deps.logger ?? consoleLogger;
  try {
    const result = await deps.target.share(buildSharePayload(input));
    if (result.status === "failed") {
      logger.error(`[ShareAction] Share failed: ${result.message}`);
    } else if (result.status === "unsupported") {
      logger.warn("[ShareAction] Sharing is not available on this platform");
    }
    return result;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`[ShareAction] Share failed: ${message}`);
    return { status: "failed", message };
  }
}
