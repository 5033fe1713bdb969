import { describe, it, expect } from 'vitest';
import { GenerateReports } from '../../../src/application/usecases/GenerateReports.js';
import { StoreUnavailableError } from '../../../src/domain/errors/PipelineError.js';
import { InMemorySalesStore } from '../../../src/infrastructure/store/InMemorySalesStore.js';
import {
  EXPECTED_GASOLINE_RANKING,
  EXPECTED_PRODUCT_SUMMARY,
  EXPECTED_REGION_SUMMARY,
  REPORT_SALES,
} from '../../support/feed.js';

describe('GenerateReports', () => {
  it('should run the three reports with the gasoline ranking by default', async () => {
    const reports = await new GenerateReports(new InMemorySalesStore({ rows: REPORT_SALES })).execute();

    expect(reports).toEqual({
      productSummary: EXPECTED_PRODUCT_SUMMARY,
      regionSummary: EXPECTED_REGION_SUMMARY,
      stateRanking: EXPECTED_GASOLINE_RANKING,
      rankingProduct: 'GASOLINA',
    });
  });

  it('should upper-case the ranking product and honour the limit', async () => {
    const store = new InMemorySalesStore({ rows: REPORT_SALES });

    const reports = await new GenerateReports(store, { rankingProduct: 'etanol', rankingLimit: 1 }).execute();

    expect(reports.rankingProduct).toBe('ETANOL');
    expect(reports.stateRanking).toEqual([{ stateCode: 'PR', avgPrice: 3.95 }]);
  });

  it('should wrap query failures in StoreUnavailableError', async () => {
    const store = new InMemorySalesStore({ faults: { reports: new Error('query failed') } });
    const execution = new GenerateReports(store).execute();

    await expect(execution).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(execution).rejects.toThrow('Report queries failed: query failed');
  });
});
