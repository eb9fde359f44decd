export { sharePdf, buildSharePayload } from "./share";
export type { ShareDeps } from "./share";
export { savePdf, buildSaveRequest } from "./save";
export type { SaveDeps } from "./save";
export { printPdf, buildPrintJob } from "./print";
export type { PrintDeps } from "./print";
export {
  createBrowserShareTarget,
  createBrowserSaveTarget,
  createBrowserPrintTarget,
} from "./browser";
export type {
  BrowserPrintHost,
  BrowserSaveHost,
  BrowserShareHost,
  SaveFilePicker,
} from "./browser";
export type {
  ActionKind,
  ActionResult,
  PrintJob,
  PrintTarget,
  SaveRequest,
  SaveTarget,
  ShareInput,
  SharePayload,
  ShareTarget,
} from "./types";
