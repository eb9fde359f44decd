/**
 * Colours shared by the reader's top and bottom bars. Applied once per page
 * as CSS custom properties on the root element, plus the browser's
 * theme-color so mobile chrome matches the bars.
 */
export interface ReaderAppearance {
  barBackground: string;
  barForeground: string;
  accent: string;
}

export const defaultReaderAppearance: ReaderAppearance = {
  barBackground: "#f8f8f8",
  barForeground: "#1f2937",
  accent: "#2563eb",
};

let applied: ReaderAppearance | null = null;

/**
 * Install the reader's bar appearance. Call once from the hosting
 * application before rendering a reader; later calls return the appearance
 * already in effect and change nothing.
 */
export function setupReaderAppearance(
  overrides?: Partial<ReaderAppearance>,
  doc: Document = document,
): ReaderAppearance {
  if (applied) return applied;

  const appearance = { ...defaultReaderAppearance, ...overrides };
  const root = doc.documentElement;
  root.style.setProperty("--reader-bar-bg", appearance.barBackground);
  root.style.setProperty("--reader-bar-fg", appearance.barForeground);
  root.style.setProperty("--reader-accent", appearance.accent);

  let meta = doc.head.querySelector<HTMLMetaElement>('meta[name="theme-color"]');
  if (!meta) {
    meta = doc.createElement("meta");
    meta.name = "theme-color";
    doc.head.appendChild(meta);
  }
  meta.content = appearance.barBackground;

  applied = appearance;
  console.log("[Appearance] Reader appearance applied", appearance);
  return appearance;
}

/** Forget the applied appearance so the next setup call runs again. */
export function resetReaderAppearance(): void {
  applied = null;
}
