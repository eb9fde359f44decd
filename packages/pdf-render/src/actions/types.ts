import type { DocumentSource } from "../PdfDocument";

export type ActionResult =
  | { status: "completed"; destination?: string }
  | { status: "cancelled" }
  | { status: "unsupported" }
  | { status: "failed"; message: string };

export type ActionKind = "share" | "save" | "print";

export interface SharePayload {
  title: string;
  url?: string;
  files?: File[];
}

/** Platform sharing mechanism (share sheet). */
export interface ShareTarget {
  share(payload: SharePayload): Promise<ActionResult>;
}

export interface SaveRequest {
  suggestedName: string;
  mimeType: string;
  data: Uint8Array;
}

/** Platform file-export dialog. */
export interface SaveTarget {
  save(request: SaveRequest): Promise<ActionResult>;
}

export interface PrintJob {
  jobName: string;
  outputType: "general";
  data: Uint8Array;
}

/** Platform print dialog. */
export interface PrintTarget {
  print(job: PrintJob): Promise<ActionResult>;
}

export interface ShareInput {
  data: Uint8Array;
  title: string;
  fileName: string;
  source: DocumentSource;
}
