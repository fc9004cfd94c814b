import { Errors } from '../errors';
import type { Table, TableRow } from './types';

export const JOIN_KEY = 'sku';

/**
 * Suffix given to a sales column whose name is already taken by an inventory column
 */
export const SALES_COLLISION_SUFFIX = '_sales';

/**
 * Inner join of the inventory and sales reports on `sku`.
 *
 * Output follows inventory order; an inventory row matching several sales
 * rows yields one joined row per match. Rows whose sku is only on one side
 * are dropped.
 *
 * @throws AppError (JOIN_ERROR) when either report has no `sku` column
 */
export function innerJoinOnSku(inventory: Table, sales: Table): Table {
  if (!inventory.columns.includes(JOIN_KEY)) {
    throw Errors.missingColumn(JOIN_KEY, 'inventory');
  }
  if (!sales.columns.includes(JOIN_KEY)) {
    throw Errors.missingColumn(JOIN_KEY, 'sales');
  }

  const inventoryColumns = new Set(inventory.columns);
  const salesColumnNames = new Map<string, string>();
  for (const column of sales.columns) {
    if (column === JOIN_KEY) continue;
    salesColumnNames.set(
      column,
      inventoryColumns.has(column) ? `${column}${SALES_COLLISION_SUFFIX}` : column
    );
  }

  const salesBySku = new Map<string, TableRow[]>();
  for (const row of sales.rows) {
    const sku = row[JOIN_KEY] ?? '';
    const bucket = salesBySku.get(sku);
    if (bucket) {
      bucket.push(row);
    } else {
      salesBySku.set(sku, [row]);
    }
  }

  const rows: TableRow[] = [];
  for (const inventoryRow of inventory.rows) {
    const matches = salesBySku.get(inventoryRow[JOIN_KEY] ?? '');
    if (!matches) continue;

    for (const salesRow of matches) {
      const joined: TableRow = { ...inventoryRow };
      for (const [column, joinedName] of salesColumnNames) {
        const cell = salesRow[column];
        if (cell !== undefined) {
          joined[joinedName] = cell;
        }
      }
      rows.push(joined);
    }
  }

  return {
    columns: [...inventory.columns, ...salesColumnNames.values()],
    rows,
  };
}
