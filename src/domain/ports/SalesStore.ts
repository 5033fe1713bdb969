import type { FuelSale } from '../model/FuelSale.js';
import type { ProductSummaryRow, RegionSummaryRow, StateRankingRow } from '../model/Report.js';

/**
 * Port for the relational store holding `vendas_combustivel`.
 *
 * Implementations throw on storage faults; the pipeline wraps those into
 * `StoreUnavailableError`. The pipeline is the only writer during a run.
 */
export interface SalesStore {
  /** Discard every stored row and recreate the table empty. */
  replaceTable(): Promise<void>;
  /** Insert all rows as one atomic unit: either every row is stored or none is. */
  insertBatch(rows: readonly FuelSale[]): Promise<void>;
  /** Count of rows currently stored. */
  countRows(): Promise<number>;
  /** Every stored row, in insertion order. */
  listSales(): Promise<readonly FuelSale[]>;
  /** Count, min, average and max sale price per product, ordered by product. */
  summarizeByProduct(): Promise<readonly ProductSummaryRow[]>;
  /** Distinct stations and average price per region and product, ordered by region then product. */
  summarizeByRegion(): Promise<readonly RegionSummaryRow[]>;
  /** States with the highest average price for `product`, descending, ties by state code. */
  rankStatesByAveragePrice(product: string, limit: number): Promise<readonly StateRankingRow[]>;
  /** Release connections. */
  close(): Promise<void>;
}
