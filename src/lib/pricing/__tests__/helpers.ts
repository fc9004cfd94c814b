import type { Table } from '../types';

/**
 * Build a report table from a header row and cell rows
 */
export function table(columns: string[], ...rows: string[][]): Table {
  return {
    columns,
    rows: rows.map((cells) =>
      Object.fromEntries(columns.map((column, index) => [column, cells[index] ?? '']))
    ),
  };
}
