import { describe, it, expect } from 'vitest';
import { cleanText, normalize, parseDate, parseDecimal, parseTaxId } from '../../../src/domain/services/Normalizer.js';
import type { RawRecord } from '../../../src/domain/model/Record.js';
import { VALID_FIELDS, sale } from '../../support/feed.js';
import type { SaleFields } from '../../support/feed.js';

function raw(overrides: Partial<SaleFields> = {}): RawRecord {
  return { ...VALID_FIELDS, ...overrides };
}

describe('cleanText', () => {
  it('should trim and collapse internal whitespace', () => {
    expect(cleanText('  SAO \t  PAULO  ')).toBe('SAO PAULO');
  });

  it('should return an empty string for whitespace only', () => {
    expect(cleanText('   ')).toBe('');
  });
});

describe('parseDecimal', () => {
  it('should accept a comma as the decimal separator', () => {
    expect(parseDecimal('valor_venda', '5,79')).toEqual({ ok: true, value: 5.79 });
  });

  it('should accept a period and integers', () => {
    expect(parseDecimal('valor_venda', '6.1')).toEqual({ ok: true, value: 6.1 });
    expect(parseDecimal('valor_venda', '7')).toEqual({ ok: true, value: 7 });
  });

  it('should reject text that is not a number', () => {
    expect(parseDecimal('valor_venda', 'abc')).toEqual({
      ok: false,
      reason: {
        kind: 'BadDecimal',
        field: 'valor_venda',
        value: 'abc',
        message: "Field 'valor_venda' value 'abc' is not a decimal number",
      },
    });
  });

  it('should reject zero', () => {
    expect(parseDecimal('valor_venda', '0,00')).toEqual({
      ok: false,
      reason: {
        kind: 'BadDecimal',
        field: 'valor_venda',
        value: '0,00',
        message: "Field 'valor_venda' must be greater than zero, got '0,00'",
      },
    });
  });

  it('should reject a value too large to be finite', () => {
    const huge = '1' + '0'.repeat(400);

    expect(parseDecimal('valor_venda', huge)).toEqual({
      ok: false,
      reason: {
        kind: 'BadDecimal',
        field: 'valor_venda',
        value: huge,
        message: `Field 'valor_venda' value '${huge}' is out of range`,
      },
    });
  });

  it('should reject negatives, thousands separators and exponents', () => {
    for (const value of ['-5,79', '1.234,56', '1e3', '5,', ',5']) {
      const result = parseDecimal('valor_venda', value);
      expect(result.ok).toBe(false);
    }
  });
});

describe('parseDate', () => {
  it('should convert DD/MM/YYYY to ISO', () => {
    expect(parseDate('data_coleta', '01/03/2024')).toEqual({ ok: true, value: '2024-03-01' });
  });

  it('should accept one-digit day and month', () => {
    expect(parseDate('data_coleta', '1/3/2024')).toEqual({ ok: true, value: '2024-03-01' });
  });

  it('should accept 29 February in a leap year', () => {
    expect(parseDate('data_coleta', '29/02/2024')).toEqual({ ok: true, value: '2024-02-29' });
  });

  it('should reject 29 February in a common year', () => {
    expect(parseDate('data_coleta', '29/02/2023')).toEqual({
      ok: false,
      reason: {
        kind: 'BadDate',
        field: 'data_coleta',
        value: '29/02/2023',
        message: "Field 'data_coleta' value '29/02/2023' is not a calendar date",
      },
    });
  });

  it('should reject day 31 in a 30-day month and month 13', () => {
    expect(parseDate('data_coleta', '31/04/2024').ok).toBe(false);
    expect(parseDate('data_coleta', '10/13/2024').ok).toBe(false);
    expect(parseDate('data_coleta', '00/01/2024').ok).toBe(false);
  });

  it('should reject other formats', () => {
    expect(parseDate('data_coleta', '2024-03-01')).toEqual({
      ok: false,
      reason: {
        kind: 'BadDate',
        field: 'data_coleta',
        value: '2024-03-01',
        message: "Field 'data_coleta' value '2024-03-01' does not match DD/MM/YYYY",
      },
    });
  });
});

describe('parseTaxId', () => {
  it('should accept the NN.NNN.NNN/NNNN-NN form', () => {
    expect(parseTaxId('cnpj', '12.345.678/0001-90')).toEqual({ ok: true, value: '12.345.678/0001-90' });
  });

  it('should reject bare digits', () => {
    expect(parseTaxId('cnpj', '12345678000190')).toEqual({
      ok: false,
      reason: {
        kind: 'BadTaxId',
        field: 'cnpj',
        value: '12345678000190',
        message: "Field 'cnpj' value '12345678000190' is not a NN.NNN.NNN/NNNN-NN registration number",
      },
    });
  });
});

describe('normalize', () => {
  it('should produce a typed sale from a valid record', () => {
    expect(normalize(raw())).toEqual({ ok: true, value: sale() });
  });

  it('should convert price 5,79 and date 01/03/2024', () => {
    const result = normalize(raw());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.salePrice).toBe(5.79);
    expect(result.value.collectionDate).toBe('2024-03-01');
  });

  it('should reject a non-numeric price with BadDecimal', () => {
    const result = normalize(raw({ valor_venda: 'abc' }));

    expect(result).toEqual({
      ok: false,
      reason: {
        kind: 'BadDecimal',
        field: 'valor_venda',
        value: 'abc',
        message: "Field 'valor_venda' value 'abc' is not a decimal number",
      },
    });
  });

  it('should reject an empty mandatory field', () => {
    const result = normalize(raw({ cnpj: '   ' }));

    expect(result).toEqual({
      ok: false,
      reason: {
        kind: 'MissingMandatoryField',
        field: 'cnpj',
        value: '   ',
        message: "Mandatory field 'cnpj' is empty",
      },
    });
  });

  it('should report the first empty mandatory field in field order', () => {
    const result = normalize(raw({ produto: '', data_coleta: '' }));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.reason.field).toBe('produto');
  });

  it('should check presence before tax id, tax id before price and price before date', () => {
    const missingAndBadPrice = normalize(raw({ data_coleta: '', valor_venda: 'abc' }));
    const badTaxIdAndPrice = normalize(raw({ cnpj: '123', valor_venda: 'abc' }));
    const badPriceAndDate = normalize(raw({ valor_venda: 'abc', data_coleta: '31/02/2024' }));

    expect(missingAndBadPrice.ok ? null : missingAndBadPrice.reason.kind).toBe('MissingMandatoryField');
    expect(badTaxIdAndPrice.ok ? null : badTaxIdAndPrice.reason.kind).toBe('BadTaxId');
    expect(badPriceAndDate.ok ? null : badPriceAndDate.reason.kind).toBe('BadDecimal');
  });

  it('should keep empty optional text fields as empty strings', () => {
    const result = normalize(raw({ bairro: '  ', bandeira: '' }));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.neighborhood).toBe('');
    expect(result.value.brand).toBe('');
  });

  it('should clean text and upper-case state code and product', () => {
    const result = normalize(raw({ municipio: '  SAO   PAULO ', uf: 'sp', produto: ' gasolina  aditivada' }));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.municipality).toBe('SAO PAULO');
    expect(result.value.stateCode).toBe('SP');
    expect(result.value.product).toBe('GASOLINA ADITIVADA');
  });

  it('should reject an overflowing price as BadDecimal', () => {
    const result = normalize(raw({ valor_venda: `1${'0'.repeat(400)},00` }));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.reason.kind).toBe('BadDecimal');
  });

  it('should keep a state code of any length as given', () => {
    const result = normalize(raw({ uf: 'sao paulo' }));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.stateCode).toBe('SAO PAULO');
  });

  it('should treat absent columns as empty', () => {
    expect(normalize({})).toEqual({
      ok: false,
      reason: {
        kind: 'MissingMandatoryField',
        field: 'cnpj',
        value: '',
        message: "Mandatory field 'cnpj' is empty",
      },
    });
  });

  it('should not mutate the raw record', () => {
    const record = Object.freeze(raw({ municipio: '  SAO   PAULO ' }));

    expect(() => normalize(record)).not.toThrow();
    expect(record['municipio']).toBe('  SAO   PAULO ');
  });

  it('should be deterministic', () => {
    const record = raw({ valor_venda: '6,49' });

    expect(normalize(record)).toEqual(normalize(record));
  });
});
