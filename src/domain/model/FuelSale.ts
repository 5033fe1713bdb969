/** Canonical column names, as stored in `vendas_combustivel`. */
export const FUEL_SALE_COLUMNS = [
  'regiao',
  'uf',
  'municipio',
  'bairro',
  'posto_nome',
  'cnpj',
  'bandeira',
  'produto',
  'valor_venda',
  'data_coleta',
] as const;

export type FuelSaleColumn = (typeof FUEL_SALE_COLUMNS)[number];

/** Columns whose empty value rejects the record. Order decides which one is reported first. */
export const MANDATORY_COLUMNS: readonly FuelSaleColumn[] = ['cnpj', 'produto', 'valor_venda', 'data_coleta'];

/** A fully normalized, type-valid fuel price observation. */
export interface FuelSale {
  readonly region: string;
  /** State code, upper-cased. Normally two letters; the length is not checked. */
  readonly stateCode: string;
  readonly municipality: string;
  readonly neighborhood: string;
  readonly stationName: string;
  /** Station registration number in `NN.NNN.NNN/NNNN-NN` form. */
  readonly taxId: string;
  readonly brand: string;
  /** Upper-cased product name. */
  readonly product: string;
  /** Price per litre, always > 0. */
  readonly salePrice: number;
  /** Calendar date in ISO `YYYY-MM-DD` form. */
  readonly collectionDate: string;
}
