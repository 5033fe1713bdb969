import type { RunReports } from '../../domain/model/Report.js';
import type { SalesStore } from '../../domain/ports/SalesStore.js';
import { StoreUnavailableError, errorMessage } from '../../domain/errors/PipelineError.js';

export interface GenerateReportsOptions {
  /** Product the state ranking is computed for. Default: `'GASOLINA'`. */
  readonly rankingProduct?: string;
  /** Number of states in the ranking. Default: `5`. */
  readonly rankingLimit?: number;
}

/** Use case: run the three fixed aggregations against the final table. */
export class GenerateReports {
  private readonly rankingProduct: string;
  private readonly rankingLimit: number;

  constructor(
    private readonly store: SalesStore,
    options?: GenerateReportsOptions,
  ) {
    this.rankingProduct = (options?.rankingProduct ?? 'GASOLINA').toUpperCase();
    this.rankingLimit = options?.rankingLimit ?? 5;
  }

  async execute(): Promise<RunReports> {
    try {
      const productSummary = await this.store.summarizeByProduct();
      const regionSummary = await this.store.summarizeByRegion();
      const stateRanking = await this.store.rankStatesByAveragePrice(this.rankingProduct, this.rankingLimit);
      return { productSummary, regionSummary, stateRanking, rankingProduct: this.rankingProduct };
    } catch (error) {
      throw new StoreUnavailableError(`Report queries failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
