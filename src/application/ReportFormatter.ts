import type { RunReports } from '../domain/model/Report.js';
import type { RunCounters } from '../domain/model/RunCounters.js';
import { RejectionKind } from '../domain/model/Rejection.js';

const RULE = '='.repeat(55);

interface Column {
  readonly header: string;
  readonly align: 'left' | 'right';
}

function price(value: number): string {
  return value.toFixed(2);
}

function title(text: string): string[] {
  return [RULE, `   ${text}`, RULE];
}

/** Render rows as a column-aligned table. Right-aligned columns pad on the left. */
export function formatTable(columns: readonly Column[], rows: readonly (readonly string[])[]): string {
  const widths = columns.map((column, i) =>
    rows.reduce((max, row) => Math.max(max, (row[i] ?? '').length), column.header.length),
  );

  const render = (cells: readonly string[]): string =>
    columns
      .map((column, i) => {
        const cell = cells[i] ?? '';
        const width = widths[i] ?? cell.length;
        return column.align === 'right' ? cell.padStart(width) : cell.padEnd(width);
      })
      .join('  ')
      .trimEnd();

  const lines = [render(columns.map((c) => c.header))];
  if (rows.length === 0) {
    lines.push('(no rows)');
  } else {
    for (const row of rows) lines.push(render(row));
  }
  return lines.join('\n');
}

/** Render the three reports as titled text tables, separated by blank lines. */
export function formatReports(reports: RunReports): string {
  const product = formatTable(
    [
      { header: 'product', align: 'left' },
      { header: 'samples', align: 'right' },
      { header: 'min', align: 'right' },
      { header: 'avg', align: 'right' },
      { header: 'max', align: 'right' },
    ],
    reports.productSummary.map((r) => [
      r.product,
      String(r.sampleCount),
      price(r.minPrice),
      price(r.avgPrice),
      price(r.maxPrice),
    ]),
  );

  const region = formatTable(
    [
      { header: 'region', align: 'left' },
      { header: 'product', align: 'left' },
      { header: 'stations', align: 'right' },
      { header: 'avg', align: 'right' },
    ],
    reports.regionSummary.map((r) => [r.region, r.product, String(r.stationCount), price(r.avgPrice)]),
  );

  const ranking = formatTable(
    [
      { header: 'state', align: 'left' },
      { header: 'avg', align: 'right' },
    ],
    reports.stateRanking.map((r) => [r.stateCode, price(r.avgPrice)]),
  );

  return [
    ...title('PRICE SUMMARY BY PRODUCT (R$/litre)'),
    product,
    '',
    ...title('REGIONAL SUMMARY (distinct stations, average price)'),
    region,
    '',
    ...title(`TOP ${String(reports.stateRanking.length)} STATES BY AVERAGE ${reports.rankingProduct} PRICE`),
    ranking,
  ].join('\n');
}

/** Render the end-of-run summary. Only rejection kinds that occurred are listed. */
export function formatRunSummary(status: string, counters: RunCounters): string {
  const lines = [
    `Run ${status}`,
    `  rows read:     ${String(counters.rowsRead)}`,
    `  rows loaded:   ${String(counters.rowsLoaded)}`,
    `  rows rejected: ${String(counters.rowsRejected)}`,
  ];

  const kinds = Object.values(RejectionKind).sort();
  for (const kind of kinds) {
    const count = counters.rejectedByKind[kind];
    if (count > 0) lines.push(`    ${kind}: ${String(count)}`);
  }

  lines.push(`  batches:       ${String(counters.batchesProcessed)}`);
  return lines.join('\n');
}
