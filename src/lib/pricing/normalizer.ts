import type { Table, TableRow } from './types';

/**
 * Canonical form of a report header: trimmed and lower-cased
 */
export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase();
}

/**
 * Rename every column of a report to its canonical header. Unknown columns are
 * kept as they are; when two headers collapse to the same name the later
 * column wins.
 */
export function normalizeTable(table: Table): Table {
  const renames = table.columns.map((column) => [column, normalizeHeader(column)] as const);
  const columns = Array.from(new Set(renames.map(([, normalized]) => normalized)));

  const rows = table.rows.map((row) => {
    const normalized: TableRow = {};
    for (const [original, canonical] of renames) {
      const cell = row[original];
      if (cell !== undefined) {
        normalized[canonical] = cell;
      }
    }
    return normalized;
  });

  return { columns, rows };
}
