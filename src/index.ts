export { RequestConfig, resolveRequestConfig } from "./config/requestConfig";
export type { ApiParams, ApiParamsOptions, ConfigOverrides, LooseOverrides, PortableApiParams } from "./config/requestConfig";
export { ADVANCED_FIELDS, PORTABLE_FIELDS } from "./config/schema";
export type { RequestConfigFields, RequestConfigInput } from "./config/schema";
export { SecretString, SettingsError, getLlmParams, getSettings, loadSettings } from "./config/settings";
export type { LoadSettingsOptions, Settings } from "./config/settings";
export {
  LLMResponse,
  assistantMessage,
  createMessage,
  messageRoles,
  parseMessage,
  systemMessage,
  userMessage,
} from "./llm/base";
export type { ChatProvider, ChatTransport, Message, MessageRole, TokenUsage, WireMessage, WireRequest } from "./llm/base";
export { DiskCache } from "./llm/cache";
export { LLMClient } from "./llm/client";
export type { LLMClientOptions } from "./llm/client";
export {
  FatalProviderError,
  LLMError,
  ProviderError,
  TransientProviderError,
  TransportHttpError,
  TransportTimeoutError,
  ValidationError,
} from "./llm/errors";
export { formatMessages } from "./llm/format";
export { createLLMClient, createTransport } from "./llm";
export type { LLMFactoryOptions } from "./llm";
export { MockTransport } from "./llm/mock";
export { OpenAITransport } from "./llm/openai";
export { RateLimiter } from "./llm/rateLimiter";
export { extractDeltaText, normalizeCompletion } from "./llm/response";
export { DEFAULT_RETRY_OPTIONS, RetryPolicy, classifyError } from "./llm/retry";
export type { RetryOptions, RetryPolicyOptions } from "./llm/retry";
export { runStartup } from "./startup";
export { logger } from "./utils/logger";
