export function renderAsciiBox(content: readonly string[]): string {
  const width = Math.max(...content.map((line) => line.length));
  const border = `+${"-".repeat(width + 2)}+`;
  const body = content.map((line) => `| ${line.padEnd(width)} |`);
  return [border, ...body, border].join("\n");
}

export function renderAsciiTable(
  rows: readonly (readonly string[])[],
  headers: readonly string[],
): string {
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => row[index]?.length ?? 0)),
  );
  const border = `+${widths.map((w) => "-".repeat(w + 2)).join("+")}+`;
  const renderRow = (row: readonly string[]): string =>
    `| ${widths.map((w, index) => (row[index] ?? "").padEnd(w)).join(" | ")} |`;
  return [border, renderRow(headers), border, ...rows.map(renderRow), border].join(
    "\n",
  );
}
