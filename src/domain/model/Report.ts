/** Per-product price summary row. Prices rounded to 2 decimals. */
export interface ProductSummaryRow {
  readonly product: string;
  readonly sampleCount: number;
  readonly minPrice: number;
  readonly avgPrice: number;
  readonly maxPrice: number;
}

/** Per-region, per-product row: distinct stations surveyed and average price. */
export interface RegionSummaryRow {
  readonly region: string;
  readonly product: string;
  readonly stationCount: number;
  readonly avgPrice: number;
}

/** One entry in the state price ranking. */
export interface StateRankingRow {
  readonly stateCode: string;
  readonly avgPrice: number;
}

/** The three reports, already queried from the final table. */
export interface RunReports {
  readonly productSummary: readonly ProductSummaryRow[];
  readonly regionSummary: readonly RegionSummaryRow[];
  readonly stateRanking: readonly StateRankingRow[];
  /** Product the state ranking was computed for. */
  readonly rankingProduct: string;
}
