/**
 * In-process stand-in for a PDF engine, for tests of code that sits on top
 * of the engine interface. It accepts any buffer starting with "%PDF" and
 * reads a title from a `/Title (…)` entry; everything else is rejected.
 */

import type {
  DocumentHandle,
  FindQuery,
  PDFEngine,
  ViewerHandle,
  ViewerMountOptions,
} from "./engines";

export interface FakePdfOptions {
  title?: string;
  pages?: number;
}

export function fakePdfText({ title, pages = 1 }: FakePdfOptions = {}): string {
  const lines = ["%PDF-1.7", `/Count ${pages}`];
  if (title !== undefined) lines.push(`/Title (${title})`);
  lines.push("%%EOF");
  return lines.join("\n");
}

export function fakePdfBytes(options?: FakePdfOptions): Uint8Array {
  return new TextEncoder().encode(fakePdfText(options));
}

export class FakeViewer implements ViewerHandle {
  finds: FindQuery[] = [];
  closeFindCalls = 0;
  zoomSteps = 0;
  fitWidthCalls = 0;
  destroyed = false;

  constructor(
    readonly container: HTMLDivElement,
    readonly options: ViewerMountOptions,
  ) {}

  find(query: FindQuery) {
    this.finds.push(query);
  }
  closeFind() {
    this.closeFindCalls++;
  }
  zoomIn() {
    this.zoomSteps++;
  }
  zoomOut() {
    this.zoomSteps--;
  }
  fitWidth() {
    this.fitWidthCalls++;
  }
  destroy() {
    this.destroyed = true;
  }
}

export class FakeEngine implements PDFEngine {
  readonly name = "Fake";
  initCalls = 0;
  loaded: Uint8Array[] = [];
  destroyed = 0;
  viewers: FakeViewer[] = [];

  async init() {
    this.initCalls++;
  }

  async loadDocument(data: Uint8Array): Promise<DocumentHandle> {
    this.loaded.push(data);
    const text = new TextDecoder().decode(data);
    if (!text.startsWith("%PDF")) {
      throw new Error("Invalid PDF structure.");
    }
    const title = /\/Title \((.*)\)/.exec(text)?.[1] ?? null;
    const pages = Number(/\/Count (\d+)/.exec(text)?.[1] ?? "1");

    return {
      pageCount: () => pages,
      getTitle: async () => title,
      mountViewer: async (container, options) => {
        const viewer = new FakeViewer(container, options);
        this.viewers.push(viewer);
        return viewer;
      },
      destroy: () => {
        this.destroyed++;
      },
    };
  }
}
