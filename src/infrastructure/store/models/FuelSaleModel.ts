import { DataTypes } from 'sequelize';
import type { Model, ModelStatic, Optional, Sequelize } from 'sequelize';

export const SALES_TABLE = 'vendas_combustivel';

export interface FuelSaleRow {
  id: number;
  region: string;
  stateCode: string;
  municipality: string;
  neighborhood: string;
  stationName: string;
  taxId: string;
  brand: string;
  product: string;
  salePrice: number;
  collectionDate: string;
}

export type FuelSaleCreationRow = Optional<FuelSaleRow, 'id'>;

export type FuelSaleInstance = Model<FuelSaleRow, FuelSaleCreationRow>;

export type FuelSaleModel = ModelStatic<FuelSaleInstance>;

/** Attributes are camel-cased; `field` maps each to its column in the table. */
export function defineFuelSaleModel(sequelize: Sequelize): FuelSaleModel {
  return sequelize.define<FuelSaleInstance>(
    'FuelSale',
    {
      id: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        autoIncrement: true,
      },
      region: {
        type: DataTypes.STRING(8),
        allowNull: false,
        field: 'regiao',
      },
      stateCode: {
        type: DataTypes.STRING,
        allowNull: false,
        field: 'uf',
      },
      municipality: {
        type: DataTypes.STRING(120),
        allowNull: false,
        field: 'municipio',
      },
      neighborhood: {
        type: DataTypes.STRING(120),
        allowNull: false,
        field: 'bairro',
      },
      stationName: {
        type: DataTypes.STRING(200),
        allowNull: false,
        field: 'posto_nome',
      },
      taxId: {
        type: DataTypes.STRING(18),
        allowNull: false,
        field: 'cnpj',
      },
      brand: {
        type: DataTypes.STRING(80),
        allowNull: false,
        field: 'bandeira',
      },
      product: {
        type: DataTypes.STRING(40),
        allowNull: false,
        field: 'produto',
      },
      salePrice: {
        type: DataTypes.DOUBLE,
        allowNull: false,
        field: 'valor_venda',
      },
      collectionDate: {
        type: DataTypes.DATEONLY,
        allowNull: false,
        field: 'data_coleta',
      },
    },
    {
      tableName: SALES_TABLE,
      timestamps: false,
    },
  );
}
