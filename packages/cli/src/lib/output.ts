/**
 * CLI Output Formatting Utilities
 */

/**
 * Print data as a simple aligned table to stdout.
 */
export function printTable(
  headers: string[],
  rows: string[][],
): void {
  const colWidths = headers.map((h, i) => {
    const maxData = rows.reduce((max, row) => Math.max(max, (row[i] ?? '').length), 0);
    return Math.max(h.length, maxData);
  });

  const sep = colWidths.map((w) => '─'.repeat(w + 2)).join('┼');
  const formatRow = (cells: string[]) =>
    cells.map((cell, i) => ` ${cell.padEnd(colWidths[i] ?? 0)} `).join('│');

  console.log(formatRow(headers));
  console.log(sep);
  for (const row of rows) {
    console.log(formatRow(row));
  }
}

/**
 * Print JSON to stdout (pretty if tty, compact otherwise).
 */
export function printJson(data: unknown): void {
  const indent = process.stdout.isTTY ? 2 : 0;
  console.log(JSON.stringify(data, null, indent));
}

/**
 * Truncate a string to a max length with "…" suffix.
 */
export function truncate(str: string, max: number): string {
  if (str.length <= max) return str;
  return str.slice(0, max - 1) + '…';
}
