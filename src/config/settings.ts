import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { ApiParams, ApiParamsOptions, ConfigOverrides, RequestConfig } from "./requestConfig";
import { RawSettings, SETTINGS_KEYS, readConfigFile, settingsSchema } from "./schema";
import type { RetryOptions } from "../llm/retry";
import type { RateLimiterOptions } from "../llm/rateLimiter";
import { logger } from "../utils/logger";

const MASK = "**********";

/** Wraps a credential so that printing, logging or serializing it shows a mask. */
export class SecretString {
  constructor(private readonly value: string) {}

  reveal(): string {
    return this.value;
  }

  toString() {
    return MASK;
  }

  toJSON() {
    return MASK;
  }

  [Symbol.for("nodejs.util.inspect.custom")]() {
    return `SecretString(${MASK})`;
  }
}

export type Environment = RawSettings["ENVIRONMENT"];
export type ProviderName = RawSettings["LLM_PROVIDER"];

export interface Settings {
  readonly apiKey: SecretString;
  readonly appName: string;
  readonly environment: Environment;
  readonly debug: boolean;
  readonly isProduction: boolean;
  readonly provider: ProviderName;
  readonly model: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  /** Code-level request defaults; clients layer their own defaults and per-call overrides on top. */
  readonly defaults: RequestConfig;
  readonly retry: Readonly<RetryOptions>;
  readonly rateLimit?: Readonly<RateLimiterOptions>;
  readonly cacheDir?: string;
  readonly vectorDbPath: string;
}

export class SettingsError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid settings:\n  - ${problems.join("\n  - ")}`);
    this.name = "SettingsError";
  }
}

export interface LoadSettingsOptions {
  /** Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  /** YAML or JSON file whose keys are the environment variable names. Environment wins. */
  configFile?: string;
  /** A `.env` file loaded into `env` before reading. Existing variables are kept. */
  envFile?: string;
}

export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const env = options.env ?? process.env;
  if (options.envFile) {
    loadEnvFile(options.envFile, env);
  }

  const fileValues = options.configFile ? readConfigFile(resolvePath(options.configFile)) : {};
  const raw: Record<string, unknown> = { ...fileValues };
  for (const key of SETTINGS_KEYS) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") {
      raw[key] = value;
    }
  }

  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SettingsError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return toSettings(parsed.data);
}

function loadEnvFile(file: string, env: NodeJS.ProcessEnv) {
  const resolved = resolvePath(file);
  if (!fs.existsSync(resolved)) {
    logger.debug("env file not found, skipping", { file: resolved });
    return;
  }
  const values = dotenv.parse(fs.readFileSync(resolved));
  for (const [key, value] of Object.entries(values)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
}

function toSettings(raw: RawSettings): Settings {
  if (raw.LLM_RETRY_MAX_MS < raw.LLM_RETRY_MIN_MS) {
    throw new SettingsError([
      `LLM_RETRY_MAX_MS (${raw.LLM_RETRY_MAX_MS}) must not be lower than LLM_RETRY_MIN_MS (${raw.LLM_RETRY_MIN_MS})`,
    ]);
  }
  const rateLimit =
    raw.LLM_RPM !== undefined || raw.LLM_TPM !== undefined
      ? Object.freeze({ rpm: raw.LLM_RPM, tpm: raw.LLM_TPM })
      : undefined;

  return Object.freeze({
    apiKey: new SecretString(raw.OPENAI_API_KEY),
    appName: raw.APP_NAME,
    environment: raw.ENVIRONMENT,
    debug: raw.DEBUG,
    isProduction: raw.ENVIRONMENT === "production",
    provider: raw.LLM_PROVIDER,
    model: raw.LLM_MODEL,
    baseUrl: raw.LLM_BASE_URL.replace(/\/+$/, ""),
    timeoutMs: raw.LLM_TIMEOUT_MS,
    defaults: new RequestConfig({
      temperature: raw.LLM_TEMPERATURE,
      maxTokens: raw.LLM_MAX_TOKENS,
      topP: raw.LLM_TOP_P,
    }),
    retry: Object.freeze({
      maxAttempts: raw.LLM_MAX_ATTEMPTS,
      minDelayMs: raw.LLM_RETRY_MIN_MS,
      maxDelayMs: raw.LLM_RETRY_MAX_MS,
    }),
    rateLimit,
    cacheDir: raw.LLM_CACHE_DIR ? resolvePath(raw.LLM_CACHE_DIR) : undefined,
    vectorDbPath: resolvePath(raw.VECTOR_DB_PATH),
  });
}

function resolvePath(target: string) {
  return path.isAbsolute(target) ? target : path.join(process.cwd(), target);
}

export const DEFAULT_ENV_FILE = ".env";

let cached: Settings | undefined;

/**
 * Loads settings from `process.env`, after `.env` in the working directory
 * when there is one, on first use and returns the same object afterwards.
 */
export function getSettings(): Settings {
  if (!cached) {
    cached = loadSettings({ envFile: DEFAULT_ENV_FILE });
  }
  return cached;
}

/** Parameters built from the settings' code defaults with `overrides` layered on top. */
export function getLlmParams(
  settings: Pick<Settings, "defaults">,
  overrides?: ConfigOverrides,
  options: ApiParamsOptions = {}
): ApiParams {
  return settings.defaults.merge(overrides).toApiParams(options);
}
