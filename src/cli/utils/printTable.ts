/**
 * Foreman CLI - Table Printer Utility
 */

/**
 * Render rows as aligned text lines (header, separator, rows)
 */
export function formatTable(headers: string[], rows: string[][]): string[] {
  if (rows.length === 0) {
    return ["No data to display"];
  }

  // Calculate column widths
  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, colIndex) => {
    return Math.max(...allRows.map((row) => stripAnsi(row[colIndex] || "").length));
  });

  const headerLine = headers.map((header, i) => header.padEnd(colWidths[i])).join(" │ ");
  const separator = colWidths.map((width) => "─".repeat(width)).join("─┼─");
  const body = rows.map((row) =>
    headers.map((_, i) => (row[i] || "").padEnd(colWidths[i])).join(" │ ")
  );

  return [headerLine, separator, ...body];
}

export function printTable(headers: string[], rows: string[][]): void {
  for (const line of formatTable(headers, rows)) {
    console.log(line);
  }
}

/**
 * Strip ANSI escape codes from string for length calculation
 */
function stripAnsi(str: string): string {
  return str.replace(/\u001b\[[0-9;]*m/g, "");
}
