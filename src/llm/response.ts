import { z } from "zod";
import { LLMResponse, MessageRole, TokenUsage, messageRoles } from "./base";
import { LLMError } from "./errors";

const tokenCount = z.number().int().nonnegative();

const usageSchema = z.object({
  prompt_tokens: tokenCount.optional(),
  completion_tokens: tokenCount.optional(),
  total_tokens: tokenCount.optional(),
});

export const completionSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          role: z.string().optional(),
          content: z.string().nullish(),
        }),
        finish_reason: z.string().nullish(),
      })
    )
    .min(1, "completion has no choices"),
  usage: usageSchema.nullish(),
});

export const chunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullish(),
          })
          .nullish(),
      })
    )
    .default([]),
});

export type CompletionPayload = z.infer<typeof completionSchema>;
export type ChunkPayload = z.infer<typeof chunkSchema>;

function isMessageRole(value: string | undefined): value is MessageRole {
  return messageRoles.some((role) => role === value);
}

function toTokenUsage(usage: z.infer<typeof usageSchema> | null | undefined): TokenUsage {
  const input = usage?.prompt_tokens ?? 0;
  const output = usage?.completion_tokens ?? 0;
  return { input, output, total: usage?.total_tokens ?? input + output };
}

export function normalizeCompletion(payload: unknown): LLMResponse {
  const parsed = completionSchema.safeParse(payload);
  if (!parsed.success) {
    throw new LLMError(`Malformed completion response: ${parsed.error.issues[0]?.message ?? "unknown"}`, parsed.error);
  }
  const message = parsed.data.choices[0].message;
  return new LLMResponse({
    content: message.content ?? "",
    role: isMessageRole(message.role) ? message.role : "assistant",
    tokenUsage: toTokenUsage(parsed.data.usage),
    raw: payload,
  });
}

/** Text carried by one stream chunk, or `undefined` when it carries none. */
export function extractDeltaText(chunk: unknown): string | undefined {
  const parsed = chunkSchema.safeParse(chunk);
  if (!parsed.success) {
    throw new LLMError(`Malformed stream chunk: ${parsed.error.issues[0]?.message ?? "unknown"}`, parsed.error);
  }
  const content = parsed.data.choices[0]?.delta?.content;
  return content ? content : undefined;
}
