import fs from "fs";
import readline from "readline";
import { Message, parseMessage } from "../llm/base";
import { LLMError, ValidationError } from "../llm/errors";

export async function* iterateJsonl(file: string): AsyncGenerator<{ line: number; value: unknown }> {
  const stream = fs.createReadStream(file, { encoding: "utf8" });
  const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
  let line = 0;
  for await (const raw of rl) {
    line += 1;
    const trimmed = raw.trim();
    if (!trimmed) continue;
    try {
      const value: unknown = JSON.parse(trimmed);
      yield { line, value };
    } catch (err) {
      throw new LLMError(`${file}:${line} is not valid JSON`, err);
    }
  }
}

/** One message object (`role`, `content`, optional `name`/`metadata`) per line, in conversation order. */
export async function readConversation(file: string): Promise<Message[]> {
  const messages: Message[] = [];
  for await (const { line, value } of iterateJsonl(file)) {
    try {
      messages.push(parseMessage(value));
    } catch (err) {
      if (err instanceof ValidationError) {
        throw new ValidationError(`${file}:${line}: ${err.message}`, err.issues);
      }
      throw err;
    }
  }
  return messages;
}
