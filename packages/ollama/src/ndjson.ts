/**
 * Newline-delimited JSON stream parsing.
 *
 * @module @tessera/ollama/ndjson
 */

/**
 * Split a byte stream into its non-blank lines. A final line without a
 * trailing newline is still yielded.
 *
 * @example
 * ```typescript
 * for await (const line of readLines(response.body)) {
 *   console.log(JSON.parse(line));
 * }
 * ```
 */
export async function* readLines(body: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
  const decoder = new TextDecoder("utf-8");
  let buffer = "";

  for await (const bytes of body) {
    buffer += decoder.decode(bytes, { stream: true });

    let newline = buffer.indexOf("\n");
    while (newline >= 0) {
      const line = buffer.slice(0, newline).trim();
      buffer = buffer.slice(newline + 1);
      if (line) {
        yield line;
      }
      newline = buffer.indexOf("\n");
    }
  }

  const rest = (buffer + decoder.decode()).trim();
  if (rest) {
    yield rest;
  }
}
