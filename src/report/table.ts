/** Plain column-aligned table; `style` colours a cell after padding. */
export function renderTable(
  headers: string[],
  rows: string[][],
  style: (cell: string, row: number, column: number) => string = (cell) => cell,
): string[] {
  const widths = headers.map((h, col) => Math.max(h.length, ...rows.map((r) => (r[col] ?? "").length)));

  const lines: string[] = [];
  lines.push(headers.map((h, col) => h.padEnd(widths[col])).join("  ").trimEnd());
  lines.push(widths.map((w) => "-".repeat(w)).join("  "));
  rows.forEach((row, rowIndex) => {
    const cells = headers.map((_, col) => style((row[col] ?? "").padEnd(widths[col]), rowIndex, col));
    lines.push(cells.join("  ").trimEnd());
  });
  return lines;
}
