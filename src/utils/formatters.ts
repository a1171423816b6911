/**
 * Formatting helpers for terminal output
 */

/**
 * Format tree connector symbols
 */
export function getTreeConnector(isLast: boolean): string {
  return isLast ? '└── ' : '├── ';
}

/**
 * Render items as a tree list under a heading line
 */
export function formatTreeList(items: readonly string[], indent: string = '  '): string[] {
  return items.map((item, index) => `${indent}${getTreeConnector(index === items.length - 1)}${item}`);
}

/**
 * Render rows as fixed-width columns. Each column is as wide as its widest
 * cell (header included) plus a two-space gutter; the last column is not padded.
 */
export function formatTable<T>(
  items: readonly T[],
  columns: ReadonlyArray<{ header: string; accessor: (item: T) => string }>
): string[] {
  const rows = [
    columns.map(column => column.header),
    ...items.map(item => columns.map(column => column.accessor(item)))
  ];
  const widths = columns.map((_, index) => Math.max(...rows.map(row => row[index].length)));

  return rows.map(row =>
    row
      .map((cell, index) => (index === row.length - 1 ? cell : cell.padEnd(widths[index] + 2)))
      .join('')
  );
}

export function pluralize(count: number, singular: string, plural: string = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}
