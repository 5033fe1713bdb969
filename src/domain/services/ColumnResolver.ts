import type { FuelSaleColumn } from '../model/FuelSale.js';
import { FUEL_SALE_COLUMNS } from '../model/FuelSale.js';

/** Header names used by the ANP open-data publication, mapped to canonical columns. */
const COLUMN_ALIASES: Readonly<Record<FuelSaleColumn, readonly string[]>> = {
  regiao: ['Regiao - Sigla', 'Regiao'],
  uf: ['Estado - Sigla', 'Estado'],
  municipio: ['Municipio'],
  bairro: ['Bairro'],
  posto_nome: ['Revenda'],
  cnpj: ['CNPJ da Revenda'],
  bandeira: ['Bandeira'],
  produto: ['Produto'],
  valor_venda: ['Valor de Venda'],
  data_coleta: ['Data da Coleta'],
};

function key(name: string): string {
  return name.trim().toLowerCase();
}

const lookup = new Map<string, FuelSaleColumn>();
for (const column of FUEL_SALE_COLUMNS) {
  lookup.set(key(column), column);
  for (const alias of COLUMN_ALIASES[column]) {
    lookup.set(key(alias), column);
  }
}

/** Resolve a header name (canonical or alias, case-insensitive) to its canonical column. */
export function resolveColumn(header: string): FuelSaleColumn | null {
  return lookup.get(key(header)) ?? null;
}

/**
 * Bind header positions to column names.
 *
 * Known headers map to canonical names; unknown headers keep their trimmed
 * name so the record still carries every field. When two headers resolve to
 * the same canonical column, the first one wins and later ones keep their own
 * trimmed name (values under a repeated name are read from the first position).
 */
export function bindHeader(headers: readonly string[]): readonly string[] {
  const seen = new Set<string>();
  return headers.map((header) => {
    const column = resolveColumn(header);
    if (column && !seen.has(column)) {
      seen.add(column);
      return column;
    }
    return header.trim();
  });
}

/** Canonical columns missing from a bound header. */
export function missingColumns(bound: readonly string[]): readonly FuelSaleColumn[] {
  return FUEL_SALE_COLUMNS.filter((column) => !bound.includes(column));
}
