import { Errors } from '../errors';
import { COERCION_FALLBACKS, coerceNumber, parseCurrency, truncate } from './coercion';
import { JOIN_KEY } from './joiner';
import type { DerivedMetrics, ItemFigures, TableRow } from './types';

export const DEFAULT_COST_PRICE_FACTOR = 0.33;

export const PRODUCT_NAME_MAX_LENGTH = 400;

/** Report column names after header normalization */
export const COLUMNS = {
  orderedProductSales: 'ordered product sales',
  unitsOrdered: 'units ordered',
  available: 'available',
  productName: ['product-name', 'product_name'],
} as const;

/**
 * Read the figures of one joined row.
 *
 * @param rowIndex - position in the joined report, carried into parse errors
 * @throws AppError (PARSE_ERROR) when ordered product sales is missing or not a number
 */
export function readItemFigures(row: TableRow, rowIndex: number): ItemFigures {
  const rawSales = row[COLUMNS.orderedProductSales];
  const orderedProductSales = parseCurrency(rawSales);
  if (orderedProductSales === null) {
    throw Errors.parse(COLUMNS.orderedProductSales, rawSales ?? '', rowIndex);
  }

  const unitsOrdered = coerceNumber(row[COLUMNS.unitsOrdered], COERCION_FALLBACKS.units_ordered);
  const available = truncate(coerceNumber(row[COLUMNS.available], COERCION_FALLBACKS.available));

  return {
    sku: row[JOIN_KEY] ?? '',
    productName: readProductName(row),
    available,
    unitsOrdered,
    orderedProductSales,
  };
}

function readProductName(row: TableRow): string {
  for (const column of COLUMNS.productName) {
    const value = row[column];
    if (value !== undefined && value !== '') {
      // count code points so a surrogate pair is never split
      return Array.from(value).slice(0, PRODUCT_NAME_MAX_LENGTH).join('');
    }
  }
  return '';
}

/**
 * Per-unit price and margin. Zero units are divided as one so the sales
 * total stands in for the unit price.
 */
export function deriveMetrics(
  orderedProductSales: number,
  unitsOrdered: number,
  costPriceFactor: number
): DerivedMetrics {
  const safeUnits = unitsOrdered !== 0 ? unitsOrdered : 1;
  const pricePerUnit = orderedProductSales / safeUnits;
  const costEstimate = pricePerUnit * costPriceFactor;

  return {
    safeUnits,
    pricePerUnit,
    costEstimate,
    grossProfitPerUnit: pricePerUnit - costEstimate,
  };
}
