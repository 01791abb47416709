import { LLMResponse, createMessage, parseMessage, systemMessage, userMessage } from "../../../src/llm/base";
import { ValidationError } from "../../../src/llm/errors";
import { formatMessages } from "../../../src/llm/format";

describe("messages", () => {
  it("creates frozen messages with empty metadata by default", () => {
    const message = createMessage({ role: "user", content: "Hello" });

    expect(message).toEqual({ role: "user", content: "Hello", metadata: {} });
    expect(Object.isFrozen(message)).toBe(true);
    expect(Object.isFrozen(message.metadata)).toBe(true);
  });

  it("rejects an unknown role", () => {
    expect(() => parseMessage({ role: "narrator", content: "Once upon a time" })).toThrow(ValidationError);
  });

  it("requires content", () => {
    expect(() => parseMessage({ role: "user" })).toThrow(ValidationError);
  });
});

describe("formatMessages", () => {
  it("keeps order and maps to role/content pairs", () => {
    expect(formatMessages([systemMessage("S"), userMessage("U")])).toEqual([
      { role: "system", content: "S" },
      { role: "user", content: "U" },
    ]);
  });

  it("drops name and metadata", () => {
    const tool = createMessage({ role: "tool", content: "42", name: "calculator", metadata: { tokens: 3 } });

    expect(formatMessages([tool])).toEqual([{ role: "tool", content: "42" }]);
  });

  it("round-trips a multi-turn conversation", () => {
    const conversation = [
      systemMessage("You are terse."),
      userMessage("Hi"),
      createMessage({ role: "assistant", content: "Hello." }),
      userMessage("Bye"),
    ];

    expect(formatMessages(conversation).map((msg) => `${msg.role}:${msg.content}`)).toEqual([
      "system:You are terse.",
      "user:Hi",
      "assistant:Hello.",
      "user:Bye",
    ]);
  });
});

describe("LLMResponse", () => {
  it("defaults to the assistant role and zero usage", () => {
    const response = new LLMResponse({ content: "ok" });

    expect(response.role).toBe("assistant");
    expect(response.tokenUsage).toEqual({ input: 0, output: 0, total: 0 });
  });

  it("leaves the raw payload out of its serialized form", () => {
    const response = new LLMResponse({
      content: "ok",
      tokenUsage: { input: 1, output: 2, total: 3 },
      raw: { id: "cmpl-1" },
    });

    expect(response.raw).toEqual({ id: "cmpl-1" });
    expect(JSON.parse(JSON.stringify(response))).toEqual({
      content: "ok",
      role: "assistant",
      tokenUsage: { input: 1, output: 2, total: 3 },
    });
  });
});
