import type { ZodError } from "zod";
import { ValidationError } from "../llm/errors";
import { logger } from "../utils/logger";
import {
  ADVANCED_FIELDS,
  PORTABLE_FIELDS,
  RequestConfigField,
  RequestConfigFields,
  RequestConfigInput,
  WIRE_KEYS,
  requestConfigSchema,
} from "./schema";

/** Parameters as the chat-completions endpoint spells them. Unset optional fields are absent. */
export interface PortableApiParams {
  temperature: number;
  max_tokens: number;
  top_p: number;
  stream: boolean;
  stop?: string[];
}

export interface ApiParams extends PortableApiParams {
  seed?: number;
  frequency_penalty?: number;
  presence_penalty?: number;
  logit_bias?: Record<string, number>;
  user?: string;
  response_format?: Record<string, string>;
}

export interface ApiParamsOptions {
  /** Leave out provider-specific fields. */
  portableOnly?: boolean;
}

/** Loosely typed overrides; keys may be camelCase or the provider's snake_case. */
export type LooseOverrides = Readonly<Record<string, unknown>>;

export type ConfigOverrides = RequestConfig | LooseOverrides;

const ALL_FIELDS: readonly RequestConfigField[] = [...PORTABLE_FIELDS, ...ADVANCED_FIELDS];

const KEY_ALIASES: ReadonlyMap<string, RequestConfigField> = new Map(
  ALL_FIELDS.flatMap((field): Array<[string, RequestConfigField]> => [
    [field, field],
    [WIRE_KEYS[field], field],
  ])
);

/**
 * Immutable, validated parameter set for one chat-completion call.
 *
 * Construction throws {@link ValidationError} when a bounded field is out of
 * range. `merge` layers overrides on top and returns a new instance; the
 * receiver is never modified.
 */
export class RequestConfig {
  readonly temperature: number;
  readonly maxTokens: number;
  readonly topP: number;
  readonly stream: boolean;
  readonly stop?: readonly string[];
  readonly seed?: number;
  readonly frequencyPenalty?: number;
  readonly presencePenalty?: number;
  readonly logitBias?: Readonly<Record<string, number>>;
  readonly user?: string;
  readonly responseFormat?: Readonly<Record<string, string>>;

  constructor(input: RequestConfigInput = {}) {
    const fields = parseFields(input);
    this.temperature = fields.temperature;
    this.maxTokens = fields.maxTokens;
    this.topP = fields.topP;
    this.stream = fields.stream;
    this.stop = fields.stop && Object.freeze([...fields.stop]);
    this.seed = fields.seed;
    this.frequencyPenalty = fields.frequencyPenalty;
    this.presencePenalty = fields.presencePenalty;
    this.logitBias = fields.logitBias && Object.freeze({ ...fields.logitBias });
    this.user = fields.user;
    this.responseFormat = fields.responseFormat && Object.freeze({ ...fields.responseFormat });
    Object.freeze(this);
  }

  /** Builds a config from a loose mapping. Unknown keys are dropped with a warning. */
  static fromDict(data: LooseOverrides): RequestConfig {
    return new RequestConfig().merge(data);
  }

  /**
   * A `RequestConfig` override is complete and wins as is. A loose mapping is
   * layered over this config: `undefined` keeps the current value, `null`
   * resets the field to its default.
   */
  merge(overrides?: ConfigOverrides): RequestConfig {
    if (overrides === undefined) {
      return this;
    }
    if (overrides instanceof RequestConfig) {
      return overrides;
    }

    const { known, unknown } = splitKnownKeys(overrides);
    if (unknown.length) {
      logger.warn("Unknown request config keys ignored", {
        ignored: unknown,
        valid: ALL_FIELDS,
      });
    }
    if (!known.size) {
      return this;
    }

    const merged: Record<string, unknown> = { ...this.toJSON() };
    for (const [field, value] of known) {
      if (value === undefined) continue;
      if (value === null) {
        delete merged[field];
      } else {
        merged[field] = value;
      }
    }
    return new RequestConfig(parseFields(merged));
  }

  toApiParams(options: ApiParamsOptions = {}): ApiParams {
    const params: ApiParams = {
      temperature: this.temperature,
      max_tokens: this.maxTokens,
      top_p: this.topP,
      stream: this.stream,
    };
    if (this.stop !== undefined) params.stop = [...this.stop];
    if (options.portableOnly) {
      return params;
    }

    if (this.seed !== undefined) params.seed = this.seed;
    if (this.frequencyPenalty !== undefined) params.frequency_penalty = this.frequencyPenalty;
    if (this.presencePenalty !== undefined) params.presence_penalty = this.presencePenalty;
    if (this.logitBias !== undefined) params.logit_bias = { ...this.logitBias };
    if (this.user !== undefined) params.user = this.user;
    if (this.responseFormat !== undefined) params.response_format = { ...this.responseFormat };
    return params;
  }

  toJSON(): RequestConfigFields {
    const fields: RequestConfigFields = {
      temperature: this.temperature,
      maxTokens: this.maxTokens,
      topP: this.topP,
      stream: this.stream,
    };
    if (this.stop !== undefined) fields.stop = [...this.stop];
    if (this.seed !== undefined) fields.seed = this.seed;
    if (this.frequencyPenalty !== undefined) fields.frequencyPenalty = this.frequencyPenalty;
    if (this.presencePenalty !== undefined) fields.presencePenalty = this.presencePenalty;
    if (this.logitBias !== undefined) fields.logitBias = { ...this.logitBias };
    if (this.user !== undefined) fields.user = this.user;
    if (this.responseFormat !== undefined) fields.responseFormat = { ...this.responseFormat };
    return fields;
  }
}

/** Per-call override > client default > field default. */
export function resolveRequestConfig(
  defaults: RequestConfig,
  overrides?: ConfigOverrides
): RequestConfig {
  return defaults.merge(overrides);
}

function splitKnownKeys(data: LooseOverrides) {
  const known = new Map<RequestConfigField, unknown>();
  const unknown: string[] = [];
  for (const [key, value] of Object.entries(data)) {
    const field = KEY_ALIASES.get(key);
    if (field) {
      known.set(field, value);
    } else {
      unknown.push(key);
    }
  }
  return { known, unknown };
}

function parseFields(input: unknown): RequestConfigFields {
  const result = requestConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      `Invalid request config: ${describeIssues(result.error, input)}`,
      result.error.issues
    );
  }
  return result.data;
}

function describeIssues(error: ZodError, input: unknown) {
  return error.issues
    .map((issue) => {
      const field = issue.path.join(".");
      const got = valueAt(input, issue.path[0]);
      return got === undefined ? `${field}: ${issue.message}` : `${field}: ${issue.message}, got ${JSON.stringify(got)}`;
    })
    .join("; ");
}

function valueAt(input: unknown, key: string | number | undefined) {
  if (key === undefined || typeof input !== "object" || input === null) {
    return undefined;
  }
  return Object.entries(input).find(([name]) => name === String(key))?.[1];
}
