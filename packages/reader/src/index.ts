export { PdfReader } from "./pdf/PdfReader";
export type { PdfReaderProps } from "./pdf/PdfReader";
export { PdfSurface } from "./pdf/PdfSurface";
export { PdfFindBar } from "./pdf/PdfFindBar";
export { PdfActionBar } from "./pdf/PdfActionBar";
export { PdfTitleMenu } from "./pdf/PdfTitleMenu";
export { useKeyboardShortcuts } from "./pdf/useKeyboardShortcuts";
export { PdfReaderStore } from "./stores/PdfReaderStore";
export type {
  LoadRequest,
  PdfReaderStoreDeps,
  ReaderNotice,
  ReaderTargets,
} from "./stores/PdfReaderStore";
export {
  defaultReaderAppearance,
  resetReaderAppearance,
  setupReaderAppearance,
} from "./appearance";
export type { ReaderAppearance } from "./appearance";
