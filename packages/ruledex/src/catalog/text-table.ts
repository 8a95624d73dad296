import { graphemeLength } from "./graphemes.js";

function displayWidth(value: string): number {
  return graphemeLength(value);
}

function pad(value: string, width: number): string {
  return value + " ".repeat(width - displayWidth(value));
}

/**
 * Bordered plain-text table. Each column is as wide as its widest cell,
 * header included, counted in grapheme clusters.
 */
export class TextTable {
  private readonly rows: string[][] = [];

  constructor(private readonly columns: readonly string[]) {}

  addRow(values: readonly string[]): void {
    if (values.length !== this.columns.length) {
      throw new Error(`Expected ${this.columns.length} cells, got ${values.length}`);
    }
    this.rows.push([...values]);
  }

  render(): string {
    const widths = this.columns.map((header, i) =>
      Math.max(displayWidth(header), ...this.rows.map((row) => displayWidth(row[i] ?? ""))),
    );

    const separator = "+" + widths.map((w) => "-".repeat(w + 2)).join("+") + "+";
    const line = (cells: readonly string[]) =>
      "| " + cells.map((cell, i) => pad(cell, widths[i] ?? 0)).join(" | ") + " |";

    const lines = [separator, line(this.columns), separator];
    if (this.rows.length > 0) {
      lines.push(...this.rows.map(line), separator);
    }
    return lines.join("\n");
  }
}
