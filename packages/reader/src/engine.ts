import type { EngineInitOptions } from "@quire/pdf-render";
import { createPdfjsEngine } from "@quire/pdf-render/pdfjs";
import workerSrc from "pdfjs-dist/legacy/build/pdf.worker.mjs?url";

/** One pdf.js engine for the whole app; its worker is served by Vite. */
export const readerEngine = createPdfjsEngine();

export const readerEngineOptions: EngineInitOptions = { workerSrc };
