import type { FuelSale } from '../../domain/model/FuelSale.js';
import type { ProductSummaryRow, RegionSummaryRow, StateRankingRow } from '../../domain/model/Report.js';
import type { SalesStore } from '../../domain/ports/SalesStore.js';

/** Errors the store throws on demand, for exercising abort paths. */
export interface InMemorySalesStoreFaults {
  /** Thrown by `replaceTable()`. */
  readonly replace?: Error;
  /** Thrown by the `call`-th `insertBatch()` (1-based). */
  readonly insert?: { readonly call: number; readonly error: Error };
  /** Thrown by every report query. */
  readonly reports?: Error;
}

export interface InMemorySalesStoreOptions {
  /** Rows present before the first run, as if left by an earlier one. */
  readonly rows?: readonly FuelSale[];
  readonly faults?: InMemorySalesStoreFaults;
}

function round2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function average(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function groupBy<K extends string>(rows: readonly FuelSale[], key: (row: FuelSale) => K): Map<K, FuelSale[]> {
  const groups = new Map<K, FuelSale[]>();
  for (const row of rows) {
    const k = key(row);
    const group = groups.get(k);
    if (group) group.push(row);
    else groups.set(k, [row]);
  }
  return groups;
}

/**
 * Non-persistent `SalesStore`. Reports follow the same grouping, rounding and
 * ordering as the SQL ones.
 */
export class InMemorySalesStore implements SalesStore {
  private rows: FuelSale[];
  private insertCalls = 0;
  private readonly faults: InMemorySalesStoreFaults;

  constructor(options?: InMemorySalesStoreOptions) {
    this.rows = [...(options?.rows ?? [])];
    this.faults = options?.faults ?? {};
  }

  replaceTable(): Promise<void> {
    if (this.faults.replace) return Promise.reject(this.faults.replace);
    this.rows = [];
    return Promise.resolve();
  }

  insertBatch(rows: readonly FuelSale[]): Promise<void> {
    this.insertCalls++;
    const fault = this.faults.insert;
    if (fault && fault.call === this.insertCalls) return Promise.reject(fault.error);
    this.rows.push(...rows);
    return Promise.resolve();
  }

  countRows(): Promise<number> {
    return Promise.resolve(this.rows.length);
  }

  listSales(): Promise<readonly FuelSale[]> {
    return Promise.resolve([...this.rows]);
  }

  summarizeByProduct(): Promise<readonly ProductSummaryRow[]> {
    if (this.faults.reports) return Promise.reject(this.faults.reports);

    const summary = [...groupBy(this.rows, (r) => r.product)]
      .sort(([a], [b]) => compareText(a, b))
      .map(([product, group]) => {
        const prices = group.map((r) => r.salePrice);
        return {
          product,
          sampleCount: group.length,
          minPrice: round2(Math.min(...prices)),
          avgPrice: round2(average(prices)),
          maxPrice: round2(Math.max(...prices)),
        };
      });
    return Promise.resolve(summary);
  }

  summarizeByRegion(): Promise<readonly RegionSummaryRow[]> {
    if (this.faults.reports) return Promise.reject(this.faults.reports);

    const summary = [...groupBy(this.rows, (r) => `${r.region}\u0000${r.product}`).values()]
      .map((group) => {
        const first = group[0];
        return {
          region: first?.region ?? '',
          product: first?.product ?? '',
          stationCount: new Set(group.map((r) => r.taxId)).size,
          avgPrice: round2(average(group.map((r) => r.salePrice))),
        };
      })
      .sort((a, b) => compareText(a.region, b.region) || compareText(a.product, b.product));
    return Promise.resolve(summary);
  }

  rankStatesByAveragePrice(product: string, limit: number): Promise<readonly StateRankingRow[]> {
    if (this.faults.reports) return Promise.reject(this.faults.reports);

    const matching = this.rows.filter((r) => r.product === product);
    const ranking = [...groupBy(matching, (r) => r.stateCode)]
      .map(([stateCode, group]) => ({
        stateCode,
        avgPrice: round2(average(group.map((r) => r.salePrice))),
      }))
      .sort((a, b) => b.avgPrice - a.avgPrice || compareText(a.stateCode, b.stateCode))
      .slice(0, limit);
    return Promise.resolve(ranking);
  }

  close(): Promise<void> {
    return Promise.resolve();
  }
}
