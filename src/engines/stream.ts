/**
 * Yields the `data` payload of each server-sent event in a response body.
 * Multi-line data fields are joined with newlines; comments and other fields
 * are skipped.
 */
export async function* readEventData(body: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
  const decoder = new TextDecoder();
  let buffer = '';
  let data: string[] = [];

  function* takeLines(final: boolean): Generator<string> {
    let newline = buffer.indexOf('\n');
    while (newline !== -1) {
      const line = buffer.slice(0, newline).replace(/\r$/, '');
      buffer = buffer.slice(newline + 1);
      yield line;
      newline = buffer.indexOf('\n');
    }
    if (final && buffer.length > 0) {
      const line = buffer.replace(/\r$/, '');
      buffer = '';
      yield line;
    }
  }

  function* dispatch(lines: Iterable<string>): Generator<string> {
    for (const line of lines) {
      if (line === '') {
        if (data.length > 0) yield data.join('\n');
        data = [];
      } else if (line.startsWith('data:')) {
        data.push(line.slice(5).replace(/^ /, ''));
      }
    }
  }

  for await (const chunk of body) {
    buffer += decoder.decode(chunk, { stream: true });
    yield* dispatch(takeLines(false));
  }

  buffer += decoder.decode();
  yield* dispatch(takeLines(true));
  if (data.length > 0) yield data.join('\n');
}
