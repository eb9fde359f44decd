import type { TitleLookup } from "../DocumentLoader";
import { consoleLogger, type Logger } from "../logger";
import type { ActionResult, PrintJob, PrintTarget } from "./types";

export interface PrintDeps {
  target: PrintTarget;
  /** Recovers the metadata title from the bytes (the job name). */
  resolveTitle: (data: Uint8Array) => Promise<TitleLookup>;
  /**
   * Job name used when the bytes parse but carry no title.
   * Without it such a document is not printed.
   */
  fallbackJobName?: string;
  logger?: Logger;
}

export function buildPrintJob(jobName: string, data: Uint8Array): PrintJob {
  return { jobName, outputType: "general", data };
}

/**
 * Print the bytes through the platform print dialog, named after the
 * document title. Unreadable bytes, or a missing title with no fallback,
 * abort before anything reaches the dialog with a single log entry.
 */
export async function printPdf(
  data: Uint8Array,
  deps: PrintDeps,
): Promise<ActionResult> {
  const logger = deps.logger ?? consoleLogger;
  const { title, error } = await deps.resolveTitle(data);

  if (error !== undefined) {
    const message = `Invalid PDF data: ${error}`;
    logger.error(`[PrintAction] ${message}`);
    return { status: "failed", message };
  }

  const jobName = title ?? deps.fallbackJobName;
  if (!jobName) {
    const message = "No title found in PDF metadata";
    logger.error(`[PrintAction] ${message}`);
    return { status: "failed", message };
  }

  try {
    const result = await deps.target.print(buildPrintJob(jobName, data));
    if (result.status === "failed") {
      logger.error(`[PrintAction] Print failed: ${result.message}`);
    }
    return result;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`[PrintAction] Print failed: ${message}`);
    return { status: "failed", message };
  }
}
