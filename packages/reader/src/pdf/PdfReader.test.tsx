// @vitest-environment jsdom
import type {
  ActionResult,
  DocumentSource,
  Logger,
  SaveRequest,
} from "@quire/pdf-render";
import { FakeEngine, fakePdfBytes } from "@quire/pdf-render/testing";
import {
  cleanup,
  fireEvent,
  render,
  screen,
  waitFor,
} from "@testing-library/react";
import { afterEach, describe, it, expect, vi } from "vitest";
import { PdfReader } from "./PdfReader";

function createLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

function createTargets() {
  return {
    share: { share: vi.fn(async (): Promise<ActionResult> => ({ status: "completed" })) },
    save: {
      save: vi.fn(
        async (_request: SaveRequest): Promise<ActionResult> => ({
          status: "completed",
        }),
      ),
    },
    print: { print: vi.fn(async (): Promise<ActionResult> => ({ status: "completed" })) },
  };
}

const reportSource: DocumentSource = {
  kind: "bytes",
  data: fakePdfBytes({ title: "Annual Report", pages: 3 }),
};

function renderReader(
  options: {
    source?: DocumentSource;
    singlePage?: boolean;
    onDismiss?: () => void;
  } = {},
) {
  const engine = new FakeEngine();
  const targets = createTargets();
  const view = render(
    <PdfReader
      source={options.source ?? reportSource}
      singlePage={options.singlePage}
      engine={engine}
      targets={targets}
      logger={createLogger()}
      onDismiss={options.onDismiss}
    />,
  );
  return { engine, targets, view };
}

async function waitForViewer(engine: FakeEngine) {
  await waitFor(() => expect(engine.viewers).toHaveLength(1));
  const viewer = engine.viewers[0];
  if (!viewer) throw new Error("viewer was not mounted");
  return viewer;
}

describe("PdfReader", () => {
  afterEach(() => {
    cleanup();
  });

  it("should show the document title once loaded", async () => {
    const { engine } = renderReader();
    await waitForViewer(engine);

    expect(screen.getByText("Annual Report")).toBeTruthy();
    expect(screen.getByText("1 / 3")).toBeTruthy();
  });

  it("should mount a continuous viewer by default", async () => {
    const { engine } = renderReader();
    const viewer = await waitForViewer(engine);

    expect(viewer.options.displayMode).toBe("continuous");
    expect(viewer.options.scale).toBe("page-width");
  });

  it("should mount a single-page viewer when asked", async () => {
    const { engine } = renderReader({ singlePage: true });
    const viewer = await waitForViewer(engine);

    expect(viewer.options.displayMode).toBe("single-page");
  });

  it("should toggle the find bar from the search button", async () => {
    const { engine } = renderReader();
    const viewer = await waitForViewer(engine);
    const searchButton = screen.getByRole("button", { name: "Search" });

    fireEvent.click(searchButton);
    const input = screen.getByRole("searchbox", { name: "Find in document" });
    fireEvent.change(input, { target: { value: "revenue" } });
    expect(viewer.finds).toEqual([{ query: "revenue" }]);

    fireEvent.click(searchButton);
    expect(screen.queryByRole("search")).toBeNull();
    expect(viewer.closeFindCalls).toBe(1);
  });

  it("should open search with Ctrl+F and close it with Escape", async () => {
    const { engine, view } = renderReader();
    await waitForViewer(engine);
    const root = view.container.firstElementChild;
    if (!root) throw new Error("reader did not render");

    fireEvent.keyDown(root, { key: "f", ctrlKey: true });
    expect(screen.getByRole("search")).toBeTruthy();

    fireEvent.keyDown(root, { key: "Escape" });
    expect(screen.queryByRole("search")).toBeNull();
  });

  it("should show load errors", async () => {
    renderReader({
      source: { kind: "bytes", data: new TextEncoder().encode("plain text") },
    });

    expect(
      await screen.findByText("Error: Invalid PDF structure."),
    ).toBeTruthy();
  });

  it("should save from the title menu", async () => {
    const { engine, targets } = renderReader();
    await waitForViewer(engine);

    fireEvent.click(screen.getByRole("button", { name: /Annual Report/ }));
    fireEvent.click(screen.getByRole("menuitem", { name: "Save" }));

    await waitFor(() => expect(targets.save.save).toHaveBeenCalledTimes(1));
    expect(targets.save.save.mock.calls[0]?.[0].suggestedName).toBe(
      "Annual Report.pdf",
    );
    expect(await screen.findByText("Saved Annual Report.pdf")).toBeTruthy();
  });

  it("should disable Share when the platform cannot share", async () => {
    const engine = new FakeEngine();
    const { save, print } = createTargets();
    render(
      <PdfReader
        source={reportSource}
        engine={engine}
        targets={{ save, print }}
        capabilities={{
          canShare: false,
          canShareFiles: false,
          hasSavePicker: false,
          canPrint: true,
        }}
        logger={createLogger()}
      />,
    );
    await waitForViewer(engine);

    expect(screen.getByRole("button", { name: "Share" })).toHaveProperty(
      "disabled",
      true,
    );
    expect(screen.getByRole("button", { name: "Zoom in" })).toHaveProperty(
      "disabled",
      false,
    );

    fireEvent.click(screen.getByRole("button", { name: /Annual Report/ }));
    expect(screen.getByRole("menuitem", { name: "Share" })).toHaveProperty(
      "disabled",
      true,
    );
    expect(screen.getByRole("menuitem", { name: "Print" })).toHaveProperty(
      "disabled",
      false,
    );
  });

  it("should tear down and notify the host on Done", async () => {
    const onDismiss = vi.fn();
    const { engine } = renderReader({ onDismiss });
    const viewer = await waitForViewer(engine);

    fireEvent.click(screen.getByRole("button", { name: "Done" }));

    expect(onDismiss).toHaveBeenCalledTimes(1);
    expect(viewer.destroyed).toBe(true);
    expect(engine.destroyed).toBe(1);
    expect(screen.queryByRole("button", { name: "Done" })).toBeNull();
  });
});
