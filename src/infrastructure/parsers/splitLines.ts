/** One physical line of text with its one-based position in the stream. */
export interface PhysicalLine {
  readonly text: string;
  readonly lineNumber: number;
}

function stripCarriageReturn(text: string): string {
  return text.endsWith('\r') ? text.slice(0, -1) : text;
}

/**
 * Reassemble physical lines from arbitrarily cut text chunks.
 *
 * Only the trailing partial line of the current chunk is carried over, so
 * memory stays bounded by chunk size plus the longest line. Accepts `\n` and
 * `\r\n` endings; a final line without a newline is still yielded.
 */
export async function* splitLines(chunks: AsyncIterable<string>): AsyncIterable<PhysicalLine> {
  let carry = '';
  let lineNumber = 0;

  for await (const chunk of chunks) {
    const parts = (carry + chunk).split('\n');
    carry = parts.pop() ?? '';

    for (const part of parts) {
      lineNumber++;
      yield { text: stripCarriageReturn(part), lineNumber };
    }
  }

  if (carry !== '') {
    lineNumber++;
    yield { text: stripCarriageReturn(carry), lineNumber };
  }
}
