/**
 * Splits decoded text chunks into lines. A line ends at `\n` only; one `\r`
 * just before that `\n` is dropped, and a lone `\r` stays in the line. A
 * trailing `\n` does not start another line.
 */
export async function* splitLines(chunks: AsyncIterable<string>): AsyncGenerator<string> {
  let pending = '';
  for await (const chunk of chunks) {
    pending += chunk;
    let start = 0;
    let end = pending.indexOf('\n');
    while (end !== -1) {
      const lineEnd = end > start && pending[end - 1] === '\r' ? end - 1 : end;
      yield pending.slice(start, lineEnd);
      start = end + 1;
      end = pending.indexOf('\n', start);
    }
    pending = pending.slice(start);
  }
  if (pending.length > 0) {
    yield pending;
  }
}
