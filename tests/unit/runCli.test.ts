import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runCli } from '../../src/runCli.js';
import type { CliOutput } from '../../src/runCli.js';
import { USAGE } from '../../src/config/env.js';
import { createLogger } from '../../src/logger.js';
import { InMemorySalesStore } from '../../src/infrastructure/store/InMemorySalesStore.js';
import { HEADER, feed, saleLine } from '../support/feed.js';

let testDir = '';

beforeAll(() => {
  testDir = mkdtempSync(join(tmpdir(), 'fuel-etl-cli-'));
});

afterAll(() => {
  rmSync(testDir, { recursive: true, force: true });
});

class CollectingOutput implements CliOutput {
  readonly stdout: string[] = [];
  readonly stderr: string[] = [];

  out(text: string): void {
    this.stdout.push(text);
  }

  err(text: string): void {
    this.stderr.push(text);
  }
}

function setup() {
  const output = new CollectingOutput();
  const store = new InMemorySalesStore();
  const close = vi.spyOn(store, 'close');
  const openStore = vi.fn(() => store);
  const deps = { output, openStore, logger: createLogger({ level: 'silent' }) };
  return { output, store, close, openStore, deps };
}

describe('runCli', () => {
  it('should load a file, print the reports and the summary, and exit 0', async () => {
    const file = join(testDir, 'precos.csv');
    writeFileSync(file, feed(HEADER, saleLine(), saleLine({ valor_venda: 'abc' })), 'utf-8');
    const { output, store, close, deps } = setup();

    const code = await runCli([file], {}, deps);

    expect(code).toBe(0);
    expect(output.stdout).toHaveLength(2);
    expect(output.stdout[0]).toContain('GASOLINA        1  5.79  5.79  5.79');
    expect(output.stdout[0]).toContain('TOP 1 STATES BY AVERAGE GASOLINA PRICE');
    expect(output.stdout[1]).toBe(
      [
        'Run DONE',
        '  rows read:     2',
        '  rows loaded:   1',
        '  rows rejected: 1',
        '    BadDecimal: 1',
        '  batches:       1',
      ].join('\n'),
    );
    expect(output.stderr).toEqual([]);
    expect(await store.countRows()).toBe(1);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should honour the delimiter and batch size flags', async () => {
    const file = join(testDir, 'comma.csv');
    const row = saleLine({ valor_venda: '5.79' });
    const lines = [HEADER, row, row, row].map((line) => line.replaceAll(';', ','));
    writeFileSync(file, feed(...lines), 'utf-8');
    const { output, deps } = setup();

    const code = await runCli([file, '-d', ',', '-b', '2'], {}, deps);

    expect(code).toBe(0);
    expect(output.stdout[1]).toContain('  rows loaded:   3');
    expect(output.stdout[1]).toContain('  batches:       2');
  });

  it('should exit 1 and print the cause when the source file is missing', async () => {
    const file = join(testDir, 'missing.csv');
    const { output, close, deps } = setup();

    const code = await runCli([file], {}, deps);

    expect(code).toBe(1);
    expect(output.stdout).toEqual([
      ['Run ABORTED', '  rows read:     0', '  rows loaded:   0', '  rows rejected: 0', '  batches:       0'].join('\n'),
    ]);
    expect(output.stderr).toHaveLength(1);
    expect(output.stderr[0]).toMatch(/^Error: Cannot open .*missing\.csv: ENOENT/);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should exit 1 when the table cannot be replaced', async () => {
    const file = join(testDir, 'replace.csv');
    writeFileSync(file, feed(HEADER, saleLine()), 'utf-8');
    const output = new CollectingOutput();
    const store = new InMemorySalesStore({ faults: { replace: new Error('locked') } });

    const code = await runCli([file], {}, { output, openStore: () => store, logger: createLogger({ level: 'silent' }) });

    expect(code).toBe(1);
    expect(output.stderr).toEqual(['Error: Table replace failed: locked']);
    expect(await store.countRows()).toBe(0);
  });

  it('should exit 1 with usage on invalid configuration without opening the store', async () => {
    const { output, openStore, deps } = setup();

    const code = await runCli(['-b', '0'], {}, deps);

    expect(code).toBe(1);
    expect(openStore).not.toHaveBeenCalled();
    expect(output.stderr[0]).toMatch(/^Invalid configuration: batchSize: /);
    expect(output.stderr[0]).toContain(USAGE);
  });

  it('should exit 1 on an unknown flag', async () => {
    const { output, deps } = setup();

    expect(await runCli(['--bogus'], {}, deps)).toBe(1);
    expect(output.stderr[0]).toContain(USAGE);
  });

  it('should print usage for --help and exit 0', async () => {
    const { output, openStore, deps } = setup();

    expect(await runCli(['--help'], {}, deps)).toBe(0);
    expect(output.stdout).toEqual([USAGE]);
    expect(openStore).not.toHaveBeenCalled();
  });

  it('should read the feed from stdin for the - source', async () => {
    const { output, store, deps } = setup();
    async function* stdin(): AsyncIterable<string> {
      yield feed(HEADER, saleLine({ uf: 'RJ' }));
    }

    const code = await runCli(['-'], {}, { ...deps, stdin: stdin() });

    expect(code).toBe(0);
    expect((await store.listSales()).map((s) => s.stateCode)).toEqual(['RJ']);
    expect(output.stdout[1]).toContain('  rows loaded:   1');
  });

  it('should take the source from the environment', async () => {
    const file = join(testDir, 'env.csv');
    writeFileSync(file, feed(HEADER, saleLine()), 'utf-8');
    const { deps, store } = setup();

    expect(await runCli([], { ETL_SOURCE: file }, deps)).toBe(0);
    expect(await store.countRows()).toBe(1);
  });
});
