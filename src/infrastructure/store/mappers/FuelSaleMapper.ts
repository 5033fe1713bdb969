import type { FuelSale } from '../../../domain/model/FuelSale.js';
import type { FuelSaleCreationRow, FuelSaleRow } from '../models/FuelSaleModel.js';

export function toRow(sale: FuelSale): FuelSaleCreationRow {
  return {
    region: sale.region,
    stateCode: sale.stateCode,
    municipality: sale.municipality,
    neighborhood: sale.neighborhood,
    stationName: sale.stationName,
    taxId: sale.taxId,
    brand: sale.brand,
    product: sale.product,
    salePrice: sale.salePrice,
    collectionDate: sale.collectionDate,
  };
}

export function toDomain(row: FuelSaleRow): FuelSale {
  return {
    region: row.region,
    stateCode: row.stateCode,
    municipality: row.municipality,
    neighborhood: row.neighborhood,
    stationName: row.stationName,
    taxId: row.taxId,
    brand: row.brand,
    product: row.product,
    // Some drivers hand DOUBLE back as a string.
    salePrice: Number(row.salePrice),
    collectionDate: String(row.collectionDate),
  };
}
