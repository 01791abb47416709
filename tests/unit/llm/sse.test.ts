import { readServerSentData } from "../../../src/llm/sse";

async function* bytes(...parts: string[]): AsyncGenerator<Uint8Array> {
  const encoder = new TextEncoder();
  for (const part of parts) {
    yield encoder.encode(part);
  }
}

async function read(parts: string[]) {
  const received: string[] = [];
  for await (const data of readServerSentData(bytes(...parts))) {
    received.push(data);
  }
  return received;
}

describe("readServerSentData", () => {
  it("joins lines split across network chunks", async () => {
    const received = await read(['data: {"a"', ':1}\n\nda', "ta: second\r\n", ": keep-alive\n", "event: ping\n", "data: last"]);

    expect(received).toEqual(['{"a":1}', "second", "last"]);
  });

  it("stops at the [DONE] sentinel", async () => {
    expect(await read(["data: one\n", "data: [DONE]\n", "data: two\n"])).toEqual(["one"]);
  });

  it("skips empty data lines", async () => {
    expect(await read(["data:\n", "data:   \n", "data: x\n"])).toEqual(["x"]);
  });

  it("decodes multi-byte characters split between chunks", async () => {
    const encoded = new TextEncoder().encode("data: héllo\n");
    async function* split(): AsyncGenerator<Uint8Array> {
      yield encoded.slice(0, 8);
      yield encoded.slice(8);
    }
    const received: string[] = [];

    for await (const data of readServerSentData(split())) {
      received.push(data);
    }

    expect(received).toEqual(["héllo"]);
  });
});
