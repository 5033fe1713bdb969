/** Port for splitting one physical line of delimited text into fields. */
export interface SourceParser {
  /** Fields of `line` in order. Quoting rules are the parser's concern. */
  parseFields(line: string): readonly string[];
}
