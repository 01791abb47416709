import type { ChatTransport, WireMessage, WireRequest } from "./base";

export interface MockTransportOptions {
  /** Builds the reply; defaults to echoing the last user message. */
  reply?: (messages: WireMessage[]) => string;
}

function echoLastUser(messages: WireMessage[]) {
  const lastUser = [...messages].reverse().find((msg) => msg.role === "user");
  return lastUser ? lastUser.content.trim().replace(/\s+/g, " ") : "";
}

function estimateTokens(text: string) {
  return Math.ceil(text.length / 4);
}

/** Offline transport for development and smoke tests. Answers in the provider's wire shapes. */
export class MockTransport implements ChatTransport {
  readonly name = "mock";
  private readonly reply: (messages: WireMessage[]) => string;

  constructor(options: MockTransportOptions = {}) {
    this.reply = options.reply ?? echoLastUser;
  }

  async complete(request: WireRequest): Promise<unknown> {
    const output = this.reply(request.messages);
    const promptTokens = estimateTokens(request.messages.map((msg) => msg.content).join(""));
    const completionTokens = estimateTokens(output);
    return {
      id: "mock-completion",
      model: request.model,
      choices: [{ message: { role: "assistant", content: output }, finish_reason: "stop" }],
      usage: {
        prompt_tokens: promptTokens,
        completion_tokens: completionTokens,
        total_tokens: promptTokens + completionTokens,
      },
    };
  }

  async *stream(request: WireRequest): AsyncGenerator<unknown> {
    const output = this.reply(request.messages);
    yield { choices: [{ delta: { role: "assistant", content: "" } }] };
    // words keep their trailing whitespace so the fragments join back losslessly
    for (const piece of output.match(/\S+\s*|\s+/g) ?? []) {
      yield { choices: [{ delta: { content: piece } }] };
    }
    yield { choices: [{ delta: {}, finish_reason: "stop" }] };
  }
}
