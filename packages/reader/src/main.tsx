import { logPlatformCapabilities } from "@quire/pdf-render";
import { StrictMode } from "react";
import { createRoot } from "react-dom/client";
import "pdfjs-dist/legacy/web/pdf_viewer.css";
import "./index.css";
import { setupReaderAppearance } from "./appearance";
import { AppRouter } from "./Router";

setupReaderAppearance();
logPlatformCapabilities();

const rootEl = document.getElementById("root");
if (!rootEl) throw new Error("Missing #root element");

createRoot(rootEl).render(
  <StrictMode>
    <AppRouter />
  </StrictMode>,
);
