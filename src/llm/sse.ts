/**
 * Yields the `data:` payloads of a server-sent-events body, one per line,
 * until the body ends or the `[DONE]` sentinel arrives. Lines may be split
 * across network chunks.
 */
export async function* readServerSentData(body: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
  const decoder = new TextDecoder("utf-8");
  let buffer = "";

  for await (const chunk of body) {
    buffer += decoder.decode(chunk, { stream: true });
    const lines = buffer.split("\n");
    buffer = lines.pop() ?? "";
    for (const line of lines) {
      const data = dataOf(line);
      if (data === undefined) continue;
      if (data === "[DONE]") return;
      yield data;
    }
  }

  buffer += decoder.decode();
  const data = dataOf(buffer);
  if (data !== undefined && data !== "[DONE]") {
    yield data;
  }
}

function dataOf(line: string): string | undefined {
  const trimmed = line.replace(/\r$/, "");
  if (!trimmed.startsWith("data:")) {
    return undefined;
  }
  const payload = trimmed.slice("data:".length).trim();
  return payload || undefined;
}
