import type {
  ActionResult,
  Logger,
  PrintJob,
  SaveRequest,
  SharePayload,
  ViewerHandle,
} from "@quire/pdf-render";
import { FakeEngine, fakePdfBytes, fakePdfText } from "@quire/pdf-render/testing";
import { describe, it, expect, vi } from "vitest";
import { PdfReaderStore, type PdfReaderStoreDeps } from "./PdfReaderStore";

function createLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

function createViewer() {
  return {
    find: vi.fn(),
    closeFind: vi.fn(),
    zoomIn: vi.fn(),
    zoomOut: vi.fn(),
    fitWidth: vi.fn(),
    destroy: vi.fn(),
  } satisfies ViewerHandle;
}

function createTargets() {
  return {
    share: {
      share: vi.fn(
        async (_payload: SharePayload): Promise<ActionResult> => ({
          status: "completed",
        }),
      ),
    },
    save: {
      save: vi.fn(
        async (_request: SaveRequest): Promise<ActionResult> => ({
          status: "completed",
        }),
      ),
    },
    print: {
      print: vi.fn(
        async (_job: PrintJob): Promise<ActionResult> => ({
          status: "completed",
        }),
      ),
    },
  };
}

function createStore(overrides: Partial<PdfReaderStoreDeps> = {}) {
  const engine = new FakeEngine();
  const logger = createLogger();
  const targets = createTargets();
  const onDismiss = vi.fn();
  const store = new PdfReaderStore({
    engine,
    logger,
    targets,
    onDismiss,
    ...overrides,
  });
  return { store, engine, logger, targets, onDismiss };
}

describe("PdfReaderStore", () => {
  describe("load", () => {
    it("should expose the loaded document", async () => {
      const { store, engine } = createStore();

      await store.load({
        kind: "bytes",
        data: fakePdfBytes({ title: "Annual Report", pages: 12 }),
      });

      expect(store.isLoading).toBe(false);
      expect(store.error).toBeNull();
      expect(store.title).toBe("Annual Report");
      expect(store.document?.fileName).toBe("Annual Report.pdf");
      expect(store.document?.singlePage).toBe(false);
      expect(store.pageCount).toBe(12);
      expect(engine.initCalls).toBe(1);
    });

    it("should pass the single-page flag to the document", async () => {
      const { store } = createStore();

      await store.load(
        { kind: "bytes", data: fakePdfBytes() },
        { singlePage: true },
      );

      expect(store.document?.singlePage).toBe(true);
    });

    it("should report a failed load and recover on the next one", async () => {
      const { store } = createStore();

      await store.load({
        kind: "bytes",
        data: new TextEncoder().encode("not a pdf"),
      });
      expect(store.document).toBeNull();
      expect(store.error).toBe("Invalid PDF structure.");
      expect(store.isLoading).toBe(false);

      await store.load({ kind: "bytes", data: fakePdfBytes(), name: "b.pdf" });
      expect(store.error).toBeNull();
      expect(store.title).toBe("b");
    });

    it("should initialise the engine only once", async () => {
      const { store, engine } = createStore();

      await store.load({ kind: "bytes", data: fakePdfBytes() });
      await store.load({ kind: "bytes", data: fakePdfBytes() });

      expect(engine.initCalls).toBe(1);
      // The first handle is released when the second document replaces it
      expect(engine.destroyed).toBe(1);
    });

    it("should discard a load that finishes after a newer one", async () => {
      let respond: (res: Response) => void = () => {};
      const pending = new Promise<Response>((resolve) => {
        respond = resolve;
      });
      const { store, engine } = createStore({ fetch: async () => pending });

      const slow = store.load({ kind: "url", url: "https://example.com/a.pdf" });
      await store.load({
        kind: "bytes",
        data: fakePdfBytes({ title: "Second" }),
      });

      respond(new Response(fakePdfText({ title: "First" })));
      await slow;

      expect(store.title).toBe("Second");
      expect(engine.destroyed).toBe(1);
    });
  });

  describe("find", () => {
    it("should restore the search flag when toggled twice", () => {
      const { store } = createStore();
      const viewer = createViewer();
      store.attachViewer(viewer);

      store.toggleFind();
      expect(store.isFindOpen).toBe(true);
      store.toggleFind();
      expect(store.isFindOpen).toBe(false);
      expect(viewer.closeFind).toHaveBeenCalledTimes(1);
    });

    it("should stay closed when search is disabled", () => {
      const { store } = createStore({ config: { findEnabled: false } });

      store.toggleFind();

      expect(store.isFindOpen).toBe(false);
    });

    it("should delegate queries to the viewer", () => {
      const { store } = createStore();
      const viewer = createViewer();
      store.attachViewer(viewer);
      store.setFindOpen(true);

      store.find("budget");
      store.findNext();
      store.findPrevious();

      expect(viewer.find.mock.calls).toEqual([
        [{ query: "budget" }],
        [{ query: "budget", again: true }],
        [{ query: "budget", again: true, previous: true }],
      ]);
    });

    it("should reset the query and counts when closed", () => {
      const { store } = createStore();
      store.setFindOpen(true);
      store.find("budget");
      store.setFindMatches({ current: 2, total: 5 });

      store.setFindOpen(false);

      expect(store.findQuery).toBe("");
      expect(store.findMatches).toEqual({ current: 0, total: 0 });
    });
  });

  describe("save", () => {
    it("should export the unmodified bytes under the document filename", async () => {
      const { store, targets } = createStore();
      const data = fakePdfBytes({ title: "Annual Report" });
      await store.load({ kind: "bytes", data });

      const result = await store.save();

      expect(result).toEqual({ status: "completed" });
      const request = targets.save.save.mock.calls[0]?.[0];
      expect(request?.suggestedName).toBe("Annual Report.pdf");
      expect(request?.mimeType).toBe("application/pdf");
      expect(request?.data).toBe(data);
      expect(store.notice).toEqual({
        kind: "save",
        tone: "info",
        message: "Saved Annual Report.pdf",
      });
    });

    it("should raise the dialog flag only while the dialog is up", async () => {
      const { store, targets } = createStore();
      let finish: (result: ActionResult) => void = () => {};
      targets.save.save.mockImplementation(
        () =>
          new Promise<ActionResult>((resolve) => {
            finish = resolve;
          }),
      );
      await store.load({ kind: "bytes", data: fakePdfBytes() });

      const saving = store.save();
      expect(store.isSaveDialogOpen).toBe(true);
      expect(await store.save()).toBeNull();

      finish({ status: "cancelled" });
      expect(await saving).toEqual({ status: "cancelled" });
      expect(store.isSaveDialogOpen).toBe(false);
      expect(store.notice).toBeNull();
      expect(targets.save.save).toHaveBeenCalledTimes(1);
    });

    it("should surface a failed save as a notice", async () => {
      const { store, targets, logger } = createStore();
      targets.save.save.mockResolvedValue({
        status: "failed",
        message: "Disk full",
      });
      await store.load({ kind: "bytes", data: fakePdfBytes() });

      await store.save();

      expect(logger.error).toHaveBeenCalledWith("[SaveAction] Save failed: Disk full");
      expect(store.notice).toEqual({
        kind: "save",
        tone: "error",
        message: "Disk full",
      });
    });

    it("should do nothing without a document", async () => {
      const { store, targets } = createStore();

      expect(await store.save()).toBeNull();
      expect(targets.save.save).not.toHaveBeenCalled();
    });
  });

  describe("print", () => {
    it("should name the job after the metadata title", async () => {
      const { store, targets } = createStore();
      const data = fakePdfBytes({ title: "Field Guide" });
      await store.load({ kind: "bytes", data, name: "guide.pdf" });

      await store.print();

      expect(targets.print.print).toHaveBeenCalledWith({
        jobName: "Field Guide",
        outputType: "general",
        data,
      });
    });

    it("should fall back to the display title when metadata has none", async () => {
      const { store, targets } = createStore();
      await store.load({ kind: "bytes", data: fakePdfBytes(), name: "memo.pdf" });

      await store.print();

      expect(targets.print.print.mock.calls[0]?.[0].jobName).toBe("memo");
    });

    it("should abort with one log entry when there is no title to print under", async () => {
      const { store, targets, logger } = createStore({
        config: { printFallbackToDisplayTitle: false },
      });
      await store.load({ kind: "bytes", data: fakePdfBytes(), name: "memo.pdf" });

      const result = await store.print();

      expect(result).toEqual({
        status: "failed",
        message: "No title found in PDF metadata",
      });
      expect(targets.print.print).not.toHaveBeenCalled();
      expect(logger.error).toHaveBeenCalledTimes(1);
      expect(logger.error).toHaveBeenCalledWith(
        "[PrintAction] No title found in PDF metadata",
      );
      expect(logger.warn).not.toHaveBeenCalled();
      expect(logger.log).not.toHaveBeenCalled();
      expect(store.notice?.tone).toBe("error");
    });
  });

  describe("share", () => {
    it("should share a remote document by link", async () => {
      const { store, targets } = createStore({
        fetch: async () => new Response(fakePdfText({ title: "Guide" })),
      });
      await store.load({ kind: "url", url: "https://example.com/guide.pdf" });

      await store.share();

      expect(targets.share.share).toHaveBeenCalledWith({
        title: "Guide",
        url: "https://example.com/guide.pdf",
      });
    });

    it("should share local bytes as a file", async () => {
      const { store, targets } = createStore();
      await store.load({
        kind: "bytes",
        data: fakePdfBytes({ title: "Minutes" }),
      });

      await store.share();

      const payload = targets.share.share.mock.calls[0]?.[0];
      expect(payload?.title).toBe("Minutes");
      expect(payload?.files?.map((file) => file.name)).toEqual(["Minutes.pdf"]);
    });

    it("should tell the user when sharing is unavailable", async () => {
      const { store, targets } = createStore();
      targets.share.share.mockResolvedValue({ status: "unsupported" });
      await store.load({ kind: "bytes", data: fakePdfBytes() });

      await store.share();

      expect(store.notice).toEqual({
        kind: "share",
        tone: "error",
        message: "Sharing is not available in this browser",
      });
      store.clearNotice();
      expect(store.notice).toBeNull();
    });
  });

  describe("canShare", () => {
    const noSharing = {
      canShare: false,
      canShareFiles: false,
      hasSavePicker: false,
      canPrint: true,
    };

    it("should offer sharing when a share target is given", () => {
      const { store } = createStore({ capabilities: noSharing });
      expect(store.canShare).toBe(true);
    });

    it("should follow the platform when no share target is given", () => {
      const { save, print } = createTargets();

      const without = createStore({
        targets: { save, print },
        capabilities: noSharing,
      }).store;
      const withShare = createStore({
        targets: { save, print },
        capabilities: { ...noSharing, canShare: true },
      }).store;

      expect(without.canShare).toBe(false);
      expect(withShare.canShare).toBe(true);
    });
  });

  describe("dismiss", () => {
    it("should release the document and notify the host once", async () => {
      const { store, engine, onDismiss } = createStore();
      const viewer = createViewer();
      await store.load({ kind: "bytes", data: fakePdfBytes() });
      store.attachViewer(viewer);

      store.dismiss();
      store.dismiss();

      expect(store.isDismissed).toBe(true);
      expect(store.document).toBeNull();
      expect(store.handle).toBeNull();
      expect(engine.destroyed).toBe(1);
      expect(viewer.destroy).toHaveBeenCalledTimes(1);
      expect(onDismiss).toHaveBeenCalledTimes(1);
    });

    it("should drop a load still in flight", async () => {
      const { store, engine, onDismiss } = createStore();

      const loading = store.load({ kind: "bytes", data: fakePdfBytes() });
      store.dismiss();
      await loading;

      expect(store.document).toBeNull();
      expect(store.isLoading).toBe(false);
      expect(engine.destroyed).toBe(1);
      expect(onDismiss).toHaveBeenCalledTimes(1);
    });
  });

  describe("viewer", () => {
    it("should only detach the viewer it was given", () => {
      const { store } = createStore();
      const first = createViewer();
      const second = createViewer();

      store.attachViewer(first);
      store.attachViewer(second);
      store.detachViewer(first);
      store.zoomIn();

      expect(first.destroy).toHaveBeenCalledTimes(1);
      expect(second.destroy).not.toHaveBeenCalled();
      expect(second.zoomIn).toHaveBeenCalledTimes(1);
    });
  });
});
