import { z } from "zod";
import type { ApiParams, ConfigOverrides } from "../config/requestConfig";
import { ValidationError } from "./errors";

export const messageRoles = ["system", "user", "assistant", "tool"] as const;

export type MessageRole = (typeof messageRoles)[number];

export const messageSchema = z.object({
  role: z.enum(messageRoles),
  content: z.string(),
  name: z.string().optional(),
  metadata: z.record(z.string(), z.unknown()).default({}),
});

export type MessageInput = z.input<typeof messageSchema>;

/** One conversation turn. Frozen on creation so it can be reused across calls. */
export interface Message {
  readonly role: MessageRole;
  readonly content: string;
  readonly name?: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export function createMessage(input: MessageInput): Message {
  return parseMessage(input);
}

/** Like {@link createMessage}, for values of unknown shape such as parsed JSON. */
export function parseMessage(input: unknown): Message {
  const parsed = messageSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid message: ${detail}`, parsed.error.issues);
  }
  const { role, content, name, metadata } = parsed.data;
  const message: Message =
    name === undefined
      ? { role, content, metadata: Object.freeze({ ...metadata }) }
      : { role, content, name, metadata: Object.freeze({ ...metadata }) };
  return Object.freeze(message);
}

export const systemMessage = (content: string) => createMessage({ role: "system", content });
export const userMessage = (content: string) => createMessage({ role: "user", content });
export const assistantMessage = (content: string) => createMessage({ role: "assistant", content });

export interface TokenUsage {
  input: number;
  output: number;
  total: number;
}

export interface LLMResponseInit {
  content: string;
  role?: MessageRole;
  tokenUsage?: TokenUsage;
  raw?: unknown;
}

/**
 * Normalized answer of a blocking call. `raw` keeps the provider payload for
 * debugging and is left out of `toJSON`, so it never reaches logs or caches.
 */
export class LLMResponse {
  readonly content: string;
  readonly role: MessageRole;
  readonly tokenUsage: Readonly<TokenUsage>;
  readonly raw?: unknown;

  constructor(init: LLMResponseInit) {
    this.content = init.content;
    this.role = init.role ?? "assistant";
    this.tokenUsage = Object.freeze({ ...(init.tokenUsage ?? { input: 0, output: 0, total: 0 }) });
    this.raw = init.raw;
  }

  toJSON() {
    return {
      content: this.content,
      role: this.role,
      tokenUsage: { ...this.tokenUsage },
    };
  }
}

/** `{ role, content }` pair as the chat-completions endpoint takes it. */
export interface WireMessage {
  role: MessageRole;
  content: string;
}

export interface WireRequest {
  model: string;
  messages: WireMessage[];
  params: ApiParams;
}

/**
 * The network boundary. `complete` answers with the provider's completion
 * object; `stream` yields its chunk objects. Neither retries.
 */
export interface ChatTransport {
  readonly name: string;
  complete(request: WireRequest): Promise<unknown>;
  stream(request: WireRequest): AsyncIterable<unknown>;
}

/** What callers program against; concrete clients are picked at construction time. */
export interface ChatProvider {
  readonly model: string;
  chat(messages: readonly Message[], overrides?: ConfigOverrides): Promise<LLMResponse>;
  streamChat(messages: readonly Message[], overrides?: ConfigOverrides): AsyncIterable<string>;
}
