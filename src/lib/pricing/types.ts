/**
 * Pricing recommendation types
 */

/**
 * One parsed CSV report. Row keys are the column names as they appear in
 * `columns`; cells are kept as raw text.
 */
export interface Table {
  columns: string[];
  rows: TableRow[];
}

export type TableRow = Record<string, string>;

export type Strategy = 'clear_inventory' | 'stimulate_demand' | 'premium_position' | 'hold';

export type PriceAction = 'none' | 'drop' | 'increase';

export type AdAction = 'none' | 'boost_low';

/**
 * Numeric fields read from one joined row
 */
export interface ItemFigures {
  sku: string;
  productName: string;
  /** Units on hand, truncated toward zero */
  available: number;
  /** Coerced units ordered, before truncation */
  unitsOrdered: number;
  orderedProductSales: number;
}

export interface DerivedMetrics {
  safeUnits: number;
  pricePerUnit: number;
  costEstimate: number;
  grossProfitPerUnit: number;
}

/**
 * Inputs the rule engine classifies on
 */
export interface RuleInput {
  /** A: available inventory */
  available: number;
  /** U: units ordered (truncated) */
  unitsOrdered: number;
  /** G: gross profit per unit (unrounded) */
  grossProfitPerUnit: number;
}

export interface RuleOutcome {
  strategy: Strategy;
  priceAction: PriceAction;
  priceChangePct: number;
  adAction: AdAction;
  reason: string;
}

/**
 * A recommendation as built by the pure pipeline, before it is stamped and written
 */
export interface RecommendationDraft {
  run_id: string;
  sku: string;
  product_name: string;
  available: number;
  units_ordered: number;
  current_price: number;
  gross_profit_unit: number;
  strategy: Strategy;
  price_action: PriceAction;
  price_change_pct: number;
  ad_action: AdAction;
  reason: string;
}

export interface Recommendation extends RecommendationDraft {
  created_at: string;
}

export interface RecommendationRunResult {
  run_id: string;
  sku_count: number;
  recommendations: Recommendation[];
}
