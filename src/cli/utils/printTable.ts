/**
 * Table printer for CLI output
 */

export function formatTable(headers: string[], rows: string[][]): string {
  if (rows.length === 0) {
    return "No data to display";
  }

  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, colIndex) => Math.max(...allRows.map((row) => stripAnsi(row[colIndex] ?? "").length)));

  const line = (row: string[]): string =>
    row
      .map((cell, i) => (cell ?? "").padEnd(colWidths[i]))
      .join(" │ ")
      .trimEnd();

  const separator = colWidths.map((width) => "─".repeat(width)).join("─┼─");
  return [line(headers), separator, ...rows.map(line)].join("\n");
}

export function printTable(headers: string[], rows: string[][]): void {
  console.log(formatTable(headers, rows));
}

export function truncate(text: string, max: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length <= max ? flat : `${flat.slice(0, max - 1)}…`;
}

/**
 * Strip ANSI escape codes from string for length calculation
 */
function stripAnsi(str: string): string {
  return str.replace(/\u001b\[[0-9;]*m/g, "");
}
