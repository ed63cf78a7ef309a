/** Left-aligned columns separated by ` | `, with a `-+-` rule under the header. */
export function formatTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header) => header.length);
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, cell.length);
    });
  }

  const format = (row: string[]) => row.map((cell, index) => cell.padEnd(widths[index] ?? 0)).join(' | ');
  const separator = widths.map((width) => '-'.repeat(width)).join('-+-');
  return [format(headers), separator, ...rows.map(format)].join('\n');
}
