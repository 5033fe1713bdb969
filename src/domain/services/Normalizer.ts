import type { FuelSale, FuelSaleColumn } from '../model/FuelSale.js';
import { MANDATORY_COLUMNS } from '../model/FuelSale.js';
import type { RawRecord } from '../model/Record.js';
import type { FieldResult, NormalizeResult } from '../model/NormalizeResult.js';
import { accepted, rejected } from '../model/NormalizeResult.js';
import { RejectionKind } from '../model/Rejection.js';

const DECIMAL_PATTERN = /^\d+(?:\.\d+)?$/;
const DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const TAX_ID_PATTERN = /^\d{2}\.\d{3}\.\d{3}\/\d{4}-\d{2}$/;

/** Trim and collapse internal whitespace runs to a single space. */
export function cleanText(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

/**
 * Parse a positive decimal written with a comma as the decimal separator (`5,79`).
 * A period is accepted too. Zero, negatives, thousands separators, exponents and
 * values too large for a finite number are rejected.
 */
export function parseDecimal(field: string, value: string): FieldResult<number> {
  const candidate = value.replace(/,/g, '.');

  if (!DECIMAL_PATTERN.test(candidate)) {
    return rejected({
      kind: RejectionKind.BAD_DECIMAL,
      field,
      value,
      message: `Field '${field}' value '${value}' is not a decimal number`,
    });
  }

  const parsed = Number(candidate);
  if (!Number.isFinite(parsed)) {
    return rejected({
      kind: RejectionKind.BAD_DECIMAL,
      field,
      value,
      message: `Field '${field}' value '${value}' is out of range`,
    });
  }

  if (!(parsed > 0)) {
    return rejected({
      kind: RejectionKind.BAD_DECIMAL,
      field,
      value,
      message: `Field '${field}' must be greater than zero, got '${value}'`,
    });
  }

  return accepted(parsed);
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/** Parse a `DD/MM/YYYY` date into ISO `YYYY-MM-DD`, rejecting dates that do not exist. */
export function parseDate(field: string, value: string): FieldResult<string> {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    return rejected({
      kind: RejectionKind.BAD_DATE,
      field,
      value,
      message: `Field '${field}' value '${value}' does not match DD/MM/YYYY`,
    });
  }

  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);

  if (year < 1 || month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return rejected({
      kind: RejectionKind.BAD_DATE,
      field,
      value,
      message: `Field '${field}' value '${value}' is not a calendar date`,
    });
  }

  const iso = [
    String(year).padStart(4, '0'),
    String(month).padStart(2, '0'),
    String(day).padStart(2, '0'),
  ].join('-');
  return accepted(iso);
}

/** Validate a station registration number in `NN.NNN.NNN/NNNN-NN` form. */
export function parseTaxId(field: string, value: string): FieldResult<string> {
  if (!TAX_ID_PATTERN.test(value)) {
    return rejected({
      kind: RejectionKind.BAD_TAX_ID,
      field,
      value,
      message: `Field '${field}' value '${value}' is not a NN.NNN.NNN/NNNN-NN registration number`,
    });
  }
  return accepted(value);
}

/**
 * Convert one raw record into a `FuelSale`, or say why it cannot be loaded.
 *
 * Total and pure: every input yields exactly one result and nothing is thrown.
 * Checks run in a fixed order (mandatory presence, tax id, price, date) so the
 * first failing check decides the reported reason.
 */
export function normalize(raw: RawRecord): NormalizeResult {
  const text = (column: FuelSaleColumn): string => cleanText(raw[column] ?? '');

  for (const column of MANDATORY_COLUMNS) {
    if (text(column) === '') {
      return rejected({
        kind: RejectionKind.MISSING_MANDATORY_FIELD,
        field: column,
        value: raw[column] ?? '',
        message: `Mandatory field '${column}' is empty`,
      });
    }
  }

  const taxId = parseTaxId('cnpj', text('cnpj'));
  if (!taxId.ok) return taxId;

  const salePrice = parseDecimal('valor_venda', text('valor_venda'));
  if (!salePrice.ok) return salePrice;

  const collectionDate = parseDate('data_coleta', text('data_coleta'));
  if (!collectionDate.ok) return collectionDate;

  const sale: FuelSale = {
    region: text('regiao'),
    stateCode: text('uf').toUpperCase(),
    municipality: text('municipio'),
    neighborhood: text('bairro'),
    stationName: text('posto_nome'),
    taxId: taxId.value,
    brand: text('bandeira'),
    product: text('produto').toUpperCase(),
    salePrice: salePrice.value,
    collectionDate: collectionDate.value,
  };

  return accepted(sale);
}
