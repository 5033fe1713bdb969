/** Iterate a web `ReadableStream`, releasing its lock once iteration stops. */
export async function* iterateReadable<T>(stream: ReadableStream<T>): AsyncIterable<T> {
  const reader = stream.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) return;
      yield value;
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Turn a stream of byte or text chunks into text chunks.
 *
 * String chunks pass through. Byte chunks go through one `TextDecoder` in
 * streaming mode, so a character cut between two chunks comes out whole.
 */
export async function* decodeChunks(
  chunks: AsyncIterable<string | Uint8Array>,
  encoding: string,
): AsyncIterable<string> {
  const decoder = new TextDecoder(encoding);

  for await (const chunk of chunks) {
    const text = typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
    if (text !== '') yield text;
  }

  const tail = decoder.decode();
  if (tail !== '') yield tail;
}
