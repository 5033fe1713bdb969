import { QueryTypes, Sequelize } from 'sequelize';
import type { FuelSale } from '../../domain/model/FuelSale.js';
import type { ProductSummaryRow, RegionSummaryRow, StateRankingRow } from '../../domain/model/Report.js';
import type { SalesStore } from '../../domain/ports/SalesStore.js';
import { BetterSqlite3Database } from './BetterSqlite3Database.js';
import { SALES_TABLE, defineFuelSaleModel } from './models/FuelSaleModel.js';
import type { FuelSaleModel } from './models/FuelSaleModel.js';
import * as FuelSaleMapper from './mappers/FuelSaleMapper.js';

type SqlNumber = number | string | null;

interface ProductSummaryResult {
  product: string;
  sampleCount: SqlNumber;
  minPrice: SqlNumber;
  avgPrice: SqlNumber;
  maxPrice: SqlNumber;
}

interface RegionSummaryResult {
  region: string;
  product: string;
  stationCount: SqlNumber;
  avgPrice: SqlNumber;
}

interface StateRankingResult {
  stateCode: string;
  avgPrice: SqlNumber;
}

const PRODUCT_SUMMARY_SQL = `
  SELECT produto AS product,
         COUNT(*) AS sampleCount,
         ROUND(MIN(valor_venda), 2) AS minPrice,
         ROUND(AVG(valor_venda), 2) AS avgPrice,
         ROUND(MAX(valor_venda), 2) AS maxPrice
    FROM ${SALES_TABLE}
   GROUP BY produto
   ORDER BY produto`;

const REGION_SUMMARY_SQL = `
  SELECT regiao AS region,
         produto AS product,
         COUNT(DISTINCT cnpj) AS stationCount,
         ROUND(AVG(valor_venda), 2) AS avgPrice
    FROM ${SALES_TABLE}
   GROUP BY regiao, produto
   ORDER BY regiao, produto`;

const STATE_RANKING_SQL = `
  SELECT uf AS stateCode,
         ROUND(AVG(valor_venda), 2) AS avgPrice
    FROM ${SALES_TABLE}
   WHERE produto = :product
   GROUP BY uf
   ORDER BY avgPrice DESC, uf ASC
   LIMIT :limit`;

export interface SqliteSequelizeOptions {
  /** Receives every SQL statement. Default: statements are not logged. */
  readonly logging?: (sql: string) => void;
}

/**
 * Sequelize on SQLite through better-sqlite3.
 *
 * One pooled connection: SQLite allows a single writer, and the pipeline is
 * the only one.
 */
export function createSqliteSequelize(storage: string, options?: SqliteSequelizeOptions): Sequelize {
  return new Sequelize({
    dialect: 'sqlite',
    storage,
    dialectModule: { Database: BetterSqlite3Database },
    logging: options?.logging ?? false,
    pool: { max: 1, min: 0, idle: 10000 },
  });
}

/**
 * Sequelize-backed `SalesStore` for the `vendas_combustivel` table.
 *
 * Works on any dialect Sequelize supports; the report SQL sticks to
 * `ROUND`, `AVG` and `COUNT(DISTINCT)`.
 */
export class SequelizeSalesStore implements SalesStore {
  private readonly sequelize: Sequelize;
  private readonly Sale: FuelSaleModel;

  constructor(sequelize: Sequelize) {
    this.sequelize = sequelize;
    this.Sale = defineFuelSaleModel(this.sequelize);
  }

  /** Open a SQLite file (created when missing) as a store. */
  static open(storage: string, options?: SqliteSequelizeOptions): SequelizeSalesStore {
    return new SequelizeSalesStore(createSqliteSequelize(storage, options));
  }

  async replaceTable(): Promise<void> {
    await this.Sale.sync({ force: true });
  }

  async insertBatch(rows: readonly FuelSale[]): Promise<void> {
    if (rows.length === 0) return;

    await this.sequelize.transaction(async (transaction) => {
      await this.Sale.bulkCreate(rows.map(FuelSaleMapper.toRow), { transaction });
    });
  }

  async countRows(): Promise<number> {
    return this.Sale.count();
  }

  async listSales(): Promise<readonly FuelSale[]> {
    const rows = await this.Sale.findAll({ order: [['id', 'ASC']] });
    return rows.map((row) => FuelSaleMapper.toDomain(row.get({ plain: true })));
  }

  async summarizeByProduct(): Promise<readonly ProductSummaryRow[]> {
    const rows = await this.sequelize.query<ProductSummaryResult>(PRODUCT_SUMMARY_SQL, {
      type: QueryTypes.SELECT,
    });
    return rows.map((row) => ({
      product: row.product,
      sampleCount: Number(row.sampleCount),
      minPrice: Number(row.minPrice),
      avgPrice: Number(row.avgPrice),
      maxPrice: Number(row.maxPrice),
    }));
  }

  async summarizeByRegion(): Promise<readonly RegionSummaryRow[]> {
    const rows = await this.sequelize.query<RegionSummaryResult>(REGION_SUMMARY_SQL, {
      type: QueryTypes.SELECT,
    });
    return rows.map((row) => ({
      region: row.region,
      product: row.product,
      stationCount: Number(row.stationCount),
      avgPrice: Number(row.avgPrice),
    }));
  }

  async rankStatesByAveragePrice(product: string, limit: number): Promise<readonly StateRankingRow[]> {
    const rows = await this.sequelize.query<StateRankingResult>(STATE_RANKING_SQL, {
      type: QueryTypes.SELECT,
      replacements: { product, limit },
    });
    return rows.map((row) => ({
      stateCode: row.stateCode,
      avgPrice: Number(row.avgPrice),
    }));
  }

  async close(): Promise<void> {
    await this.sequelize.close();
  }
}
