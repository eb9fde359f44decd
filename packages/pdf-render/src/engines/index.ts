export type {
  DisplayMode,
  DisplayOptions,
  DisplayScale,
  DocumentHandle,
  EngineInitOptions,
  FindMatches,
  FindQuery,
  PDFEngine,
  ViewerHandle,
  ViewerMountOptions,
} from "./types";
