import Papa from 'papaparse';
import type { SourceParser } from '../../domain/ports/SourceParser.js';

export interface CsvParserOptions {
  /** Column delimiter character. Default: `';'`. */
  readonly delimiter?: string;
}

/** CSV line parser backed by PapaParse. Handles quoted fields and doubled quotes within a single line. */
export class CsvParser implements SourceParser {
  readonly delimiter: string;

  constructor(options?: CsvParserOptions) {
    this.delimiter = options?.delimiter ?? ';';
  }

  parseFields(line: string): readonly string[] {
    const result = Papa.parse<string[]>(line, {
      delimiter: this.delimiter,
      header: false,
      dynamicTyping: false,
      skipEmptyLines: false,
    });
    return result.data[0] ?? [];
  }
}
