import type { ChatTransport, WireRequest } from "./base";
import { LLMError, TransportHttpError, TransportTimeoutError } from "./errors";
import { readServerSentData } from "./sse";
import type { SecretString } from "../config/settings";

export interface OpenAITransportOptions {
  apiKey: SecretString | string;
  baseUrl?: string;
  /** Applies to the whole blocking call, and to a stream until its headers arrive. */
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export const DEFAULT_BASE_URL = "https://api.openai.com/v1";

/** Chat-completions over HTTPS; streams arrive as server-sent events. */
export class OpenAITransport implements ChatTransport {
  readonly name = "openai";
  private readonly apiKey: SecretString | string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenAITransportOptions) {
    const key = typeof options.apiKey === "string" ? options.apiKey : options.apiKey.reveal();
    if (!key) {
      throw new Error("An API key is required for the openai transport");
    }
    this.apiKey = options.apiKey;
    this.endpoint = `${(options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "")}/chat/completions`;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async complete(request: WireRequest): Promise<unknown> {
    const response = await this.post(request, false, AbortSignal.timeout(this.timeoutMs));
    const data: unknown = await response.json();
    return data;
  }

  async *stream(request: WireRequest): AsyncGenerator<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new TransportTimeoutError(this.timeoutMs)), this.timeoutMs);
    let response: Response;
    try {
      response = await this.post(request, true, controller.signal);
    } finally {
      clearTimeout(timer);
    }
    if (!response.body) {
      throw new LLMError("Streaming response has no body");
    }
    for await (const data of readServerSentData(response.body)) {
      yield parseChunk(data);
    }
  }

  private async post(request: WireRequest, stream: boolean, signal: AbortSignal): Promise<Response> {
    const key = typeof this.apiKey === "string" ? this.apiKey : this.apiKey.reveal();
    const response = await this.fetchImpl(this.endpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${key}`,
      },
      body: JSON.stringify({
        model: request.model,
        messages: request.messages,
        ...request.params,
        stream,
      }),
      signal,
    });
    if (!response.ok) {
      const body = await response.text();
      throw new TransportHttpError(response.status, body, parseRetryAfter(response.headers.get("retry-after")));
    }
    return response;
  }
}

function parseChunk(data: string): unknown {
  try {
    const parsed: unknown = JSON.parse(data);
    return parsed;
  } catch (err) {
    throw new LLMError(`Stream chunk is not JSON: ${data.slice(0, 200)}`, err);
  }
}

export function parseRetryAfter(value: string | null): number | undefined {
  if (value === null) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return undefined;
  }
  const numeric = Number(trimmed);
  if (Number.isFinite(numeric)) {
    return Math.max(0, numeric);
  }
  const dateMillis = Date.parse(trimmed);
  if (!Number.isNaN(dateMillis)) {
    const diffSeconds = (dateMillis - Date.now()) / 1_000;
    return diffSeconds > 0 ? diffSeconds : 0;
  }
  return undefined;
}
