import { nanoid } from "nanoid";
import { ConfigOverrides, RequestConfig, resolveRequestConfig } from "../config/requestConfig";
import { Logger, logger } from "../utils/logger";
import {
  ChatProvider,
  ChatTransport,
  LLMResponse,
  Message,
  TokenUsage,
  WireRequest,
  messageRoles,
} from "./base";
import type { DiskCache } from "./cache";
import { FatalProviderError, ProviderError, TransientProviderError, ValidationError } from "./errors";
import { formatMessages } from "./format";
import type { RateLimiter } from "./rateLimiter";
import { extractDeltaText, normalizeCompletion } from "./response";
import { RetryPolicy } from "./retry";

export interface CachedResponse {
  content: string;
  role: Message["role"];
  tokenUsage: TokenUsage;
}

export interface LLMClientOptions {
  transport: ChatTransport;
  model: string;
  /** Code-level defaults, usually `settings.defaults`. Field defaults when omitted. */
  baseDefaults?: RequestConfig;
  /** Client defaults layered over `baseDefaults`. */
  defaults?: ConfigOverrides;
  retry?: RetryPolicy;
  rateLimiter?: RateLimiter;
  cache?: DiskCache<CachedResponse>;
  /** Send only the parameters every provider understands. */
  portableOnly?: boolean;
}

/**
 * Resolves the request config, formats the conversation, calls the transport
 * and normalizes what comes back. Blocking calls go through the retry policy;
 * streams are opened once and never retried, since a restarted stream would
 * repeat fragments the consumer already has.
 */
export class LLMClient implements ChatProvider {
  readonly model: string;
  readonly defaults: RequestConfig;
  private readonly transport: ChatTransport;
  private readonly retry: RetryPolicy;
  private readonly rateLimiter?: RateLimiter;
  private readonly cache?: DiskCache<CachedResponse>;
  private readonly portableOnly: boolean;
  private readonly log: Logger;

  constructor(options: LLMClientOptions) {
    if (!options.model) {
      throw new Error("LLMClient requires a model");
    }
    this.model = options.model;
    this.transport = options.transport;
    this.defaults = (options.baseDefaults ?? new RequestConfig()).merge(options.defaults);
    this.retry = options.retry ?? new RetryPolicy();
    this.rateLimiter = options.rateLimiter;
    this.cache = options.cache;
    this.portableOnly = options.portableOnly ?? false;
    this.log = logger.child("llm", { model: this.model, transport: this.transport.name });
  }

  async chat(messages: readonly Message[], overrides?: ConfigOverrides): Promise<LLMResponse> {
    const request = this.buildRequest(messages, resolveRequestConfig(this.defaults, overrides), false);
    const requestId = nanoid(8);
    const log = this.log.child("chat", { requestId });
    const cacheKey = [request, this.transport.name];

    const cached = await this.readCache(cacheKey, log);
    if (cached) {
      log.debug("served from cache");
      return new LLMResponse(cached);
    }

    log.debug("request", { messages: request.messages.length, params: request.params });
    const startedAt = Date.now();
    let attempts = 0;
    let response: LLMResponse;
    try {
      response = await this.retry.execute(async (attempt) => {
        attempts = attempt;
        const payload = await this.limited(request, () => this.transport.complete(request));
        return normalizeCompletion(payload);
      }, `chat ${requestId}`);
    } catch (error) {
      throw this.providerError("chat", error, attempts, log);
    }

    log.debug("completed", {
      attempts,
      latencyMs: Date.now() - startedAt,
      tokenUsage: response.tokenUsage,
    });
    await this.writeCache(cacheKey, response, log);
    return response;
  }

  private async readCache(key: unknown[], log: Logger): Promise<CachedResponse | undefined> {
    if (!this.cache) return undefined;
    try {
      return await this.cache.get(key);
    } catch (error) {
      log.warn("cache entry unreadable, treating as a miss", { error });
      return undefined;
    }
  }

  private async writeCache(key: unknown[], response: LLMResponse, log: Logger) {
    if (!this.cache) return;
    try {
      await this.cache.set(key, response.toJSON());
    } catch (error) {
      log.warn("cache write failed", { error });
    }
  }

  /**
   * Config is resolved before this returns, so a bad override throws here
   * rather than on first iteration. The result is single-pass.
   */
  streamChat(messages: readonly Message[], overrides?: ConfigOverrides): AsyncGenerator<string, void, undefined> {
    const request = this.buildRequest(messages, resolveRequestConfig(this.defaults, overrides), true);
    return this.streamFragments(request);
  }

  private async *streamFragments(request: WireRequest): AsyncGenerator<string, void, undefined> {
    const log = this.log.child("stream", { requestId: nanoid(8) });
    log.debug("request", { messages: request.messages.length, params: request.params });
    let fragments = 0;
    try {
      await this.limited(request, async () => undefined);
      for await (const chunk of this.transport.stream(request)) {
        const text = extractDeltaText(chunk);
        if (!text) continue;
        fragments += 1;
        yield text;
      }
    } catch (error) {
      throw this.providerError("stream", error, 1, log);
    }
    log.debug("finished", { fragments });
  }

  private buildRequest(messages: readonly Message[], config: RequestConfig, stream: boolean): WireRequest {
    if (messages.length === 0) {
      throw new ValidationError("At least one message is required");
    }
    const unknownRole = messages.find((msg) => !messageRoles.includes(msg.role));
    if (unknownRole) {
      throw new ValidationError(`Unsupported message role: ${String(unknownRole.role)}`);
    }
    const params = config.toApiParams({ portableOnly: this.portableOnly });
    params.stream = stream;
    return {
      model: this.model,
      messages: formatMessages(messages),
      params,
    };
  }

  private limited<T>(request: WireRequest, fn: () => Promise<T>): Promise<T> {
    return this.rateLimiter ? this.rateLimiter.schedule(request.params.max_tokens, fn) : fn();
  }

  private providerError(operation: string, error: unknown, attempts: number, log: Logger): ProviderError {
    const reason = error instanceof Error ? error.message : String(error);
    const message = `${operation} call to ${this.transport.name} model ${this.model} failed after ${attempts} attempt(s): ${reason}`;
    log.error(message);
    return this.retry.isRetryable(error)
      ? new TransientProviderError(message, error, attempts)
      : new FatalProviderError(message, error, attempts);
  }
}
