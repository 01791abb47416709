import fs from "fs";
import path from "path";
import { z } from "zod";
import YAML from "yaml";

function bounded(name: string, min: number, max: number) {
  const message = `${name} must be between ${min} and ${max}`;
  return z.number().min(min, message).max(max, message);
}

export const requestConfigSchema = z.object({
  // portable
  temperature: bounded("temperature", 0, 2).default(0.7),
  maxTokens: z.number().int().min(1, "maxTokens must be at least 1").default(1000),
  topP: bounded("topP", 0, 1).default(1),
  stream: z.boolean().default(false),
  stop: z.array(z.string()).optional(),
  // provider-specific
  seed: z.number().int().optional(),
  frequencyPenalty: bounded("frequencyPenalty", -2, 2).optional(),
  presencePenalty: bounded("presencePenalty", -2, 2).optional(),
  logitBias: z.record(z.string(), z.number()).optional(),
  user: z.string().optional(),
  responseFormat: z.record(z.string(), z.string()).optional(),
});

export type RequestConfigInput = z.input<typeof requestConfigSchema>;
export type RequestConfigFields = z.infer<typeof requestConfigSchema>;
export type RequestConfigField = keyof RequestConfigFields;

export const PORTABLE_FIELDS = ["temperature", "maxTokens", "topP", "stream", "stop"] as const;

export const ADVANCED_FIELDS = [
  "seed",
  "frequencyPenalty",
  "presencePenalty",
  "logitBias",
  "user",
  "responseFormat",
] as const satisfies readonly RequestConfigField[];

/** Provider spelling of every field, used for wire params and accepted as an override key. */
export const WIRE_KEYS = {
  temperature: "temperature",
  maxTokens: "max_tokens",
  topP: "top_p",
  stream: "stream",
  stop: "stop",
  seed: "seed",
  frequencyPenalty: "frequency_penalty",
  presencePenalty: "presence_penalty",
  logitBias: "logit_bias",
  user: "user",
  responseFormat: "response_format",
} as const satisfies Record<RequestConfigField, string>;

const booleanish = z
  .union([z.boolean(), z.string()])
  .transform((value) =>
    typeof value === "boolean" ? value : ["1", "true", "yes", "on"].includes(value.trim().toLowerCase())
  );

export const settingsSchema = z.object({
  OPENAI_API_KEY: z.string({ required_error: "OPENAI_API_KEY is required" }).min(1, "OPENAI_API_KEY is required"),
  APP_NAME: z.string().default("LLM Chat Client"),
  ENVIRONMENT: z.enum(["development", "production", "testing"]).default("development"),
  DEBUG: booleanish.default(false),
  LLM_PROVIDER: z.enum(["openai", "mock"]).default("openai"),
  LLM_MODEL: z.string().min(1).default("gpt-4-turbo"),
  LLM_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  LLM_MAX_TOKENS: z.coerce.number().int().min(1).default(1000),
  LLM_TOP_P: z.coerce.number().min(0).max(1).default(1),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  LLM_RETRY_MIN_MS: z.coerce.number().int().nonnegative().default(4_000),
  LLM_RETRY_MAX_MS: z.coerce.number().int().nonnegative().default(10_000),
  LLM_RPM: z.coerce.number().int().positive().optional(),
  LLM_TPM: z.coerce.number().int().positive().optional(),
  LLM_CACHE_DIR: z.string().optional(),
  VECTOR_DB_PATH: z.string().default(path.join(process.cwd(), "data", "chroma_db")),
});

export type RawSettings = z.infer<typeof settingsSchema>;

export const SETTINGS_KEYS = Object.keys(settingsSchema.shape);

export function readConfigFile(filePath: string): Record<string, unknown> {
  const data = fs.readFileSync(filePath, "utf8");
  const parsed: unknown =
    filePath.endsWith(".yaml") || filePath.endsWith(".yml") ? YAML.parse(data) : JSON.parse(data);
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`${filePath} must contain a mapping at the top level`);
  }
  return { ...parsed };
}
