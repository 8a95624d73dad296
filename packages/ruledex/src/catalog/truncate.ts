import { graphemes } from "./graphemes.js";

export interface TruncationLayout {
  /** Column at which the description cell starts. */
  startColumn: number;
  /** Fewest characters shown, however narrow the terminal. */
  minWidth: number;
}

export const ELLIPSIS = "...";

export const DEFAULT_LAYOUT: TruncationLayout = {
  startColumn: 112,
  minWidth: "configuration".length - ELLIPSIS.length,
};

export function escapeNewlines(text: string): string {
  return text.replace(/\n/g, "\\n");
}

/**
 * Fits a description into the space left of the terminal after the fixed
 * columns. Width is counted in grapheme clusters.
 */
export function truncateDescription(
  text: string,
  terminalWidth: number,
  layout: TruncationLayout = DEFAULT_LAYOUT,
): string {
  const escaped = escapeNewlines(text);
  const width = Number.isFinite(terminalWidth) ? terminalWidth : 0;
  const budget = Math.max(layout.minWidth, width - layout.startColumn, 0);

  const chars = graphemes(escaped);
  if (chars.length <= budget) return escaped;
  return chars.slice(0, budget).join("") + ELLIPSIS;
}
