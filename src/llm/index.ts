import path from "path";
import { z } from "zod";
import type { Settings } from "../config/settings";
import type { ConfigOverrides } from "../config/requestConfig";
import type { ChatTransport } from "./base";
import { messageRoles } from "./base";
import { DiskCache } from "./cache";
import { CachedResponse, LLMClient } from "./client";
import { MockTransport } from "./mock";
import { OpenAITransport } from "./openai";
import { RateLimiter } from "./rateLimiter";
import { RetryPolicy, RetryPolicyOptions } from "./retry";

export interface LLMFactoryOptions {
  /** Overrides `settings.provider`. */
  provider?: Settings["provider"];
  /** Overrides `settings.model`. */
  model?: string;
  /** Client defaults layered over `settings.defaults`. */
  defaults?: ConfigOverrides;
  portableOnly?: boolean;
  /** Swaps the transport entirely; `provider` is then ignored. */
  transport?: ChatTransport;
  /** Extra retry knobs such as a custom sleep; bounds come from settings. */
  retry?: Omit<RetryPolicyOptions, "maxAttempts" | "minDelayMs" | "maxDelayMs">;
}

const cachedResponseSchema = z.object({
  content: z.string(),
  role: z.enum(messageRoles),
  tokenUsage: z.object({
    input: z.number().int().nonnegative(),
    output: z.number().int().nonnegative(),
    total: z.number().int().nonnegative(),
  }),
});

export function createTransport(settings: Settings, provider = settings.provider): ChatTransport {
  if (provider === "mock") {
    return new MockTransport();
  }
  if (provider === "openai") {
    return new OpenAITransport({
      apiKey: settings.apiKey,
      baseUrl: settings.baseUrl,
      timeoutMs: settings.timeoutMs,
    });
  }
  throw new Error(`Unsupported provider: ${String(provider)}`);
}

export function createLLMClient(settings: Settings, options: LLMFactoryOptions = {}): LLMClient {
  const transport = options.transport ?? createTransport(settings, options.provider);
  const model = options.model ?? settings.model;
  const cache = settings.cacheDir
    ? new DiskCache<CachedResponse>(
        path.join(settings.cacheDir, model.replace(/\W+/g, "_")),
        (value) => cachedResponseSchema.parse(value)
      )
    : undefined;
  const rateLimiter = settings.rateLimit ? new RateLimiter(settings.rateLimit) : undefined;

  return new LLMClient({
    transport,
    model,
    baseDefaults: settings.defaults,
    defaults: options.defaults,
    retry: new RetryPolicy({ ...options.retry, ...settings.retry }),
    rateLimiter,
    cache,
    portableOnly: options.portableOnly,
  });
}
